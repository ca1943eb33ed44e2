import { describe, it, expect } from 'vitest';
import { StructuralValidator } from '../../../src/domain/services/StructuralValidator.js';
import type { ChatRecord, DatasetRecord } from '../../../src/domain/model/Record.js';

function reasonFor(validator: StructuralValidator, record: DatasetRecord, lineNumber = 1): string | undefined {
  const verdict = validator.validate(record, lineNumber);
  return verdict.kind === 'rejected' ? verdict.reason : undefined;
}

describe('StructuralValidator', () => {
  const validator = new StructuralValidator();

  describe('accepted records', () => {
    it('should accept a user/assistant conversation', () => {
      const record: ChatRecord = {
        messages: [
          { role: 'user', content: 'hi' },
          { role: 'assistant', content: 'yo' },
        ],
      };

      const verdict = validator.validate(record, 1);
      expect(verdict).toEqual({ kind: 'accepted', record });
    });

    it('should accept extra roles, repeated roles and any order', () => {
      const record: ChatRecord = {
        messages: [
          { role: 'system', content: 'be brief' },
          { role: 'assistant', content: 'hello' },
          { role: 'user', content: 'hi' },
          { role: 'user', content: 'again' },
        ],
      };

      expect(validator.validate(record, 1).kind).toBe('accepted');
    });

    it('should keep unrelated top-level fields', () => {
      const record = {
        id: 'ex-1',
        messages: [
          { role: 'user', content: 'q' },
          { role: 'assistant', content: 'a' },
        ],
      };

      const verdict = validator.validate(record, 3);
      expect(verdict.kind).toBe('accepted');
      if (verdict.kind === 'accepted') {
        expect(verdict.record).toBe(record);
      }
    });

    it('should accept empty content strings', () => {
      const record = {
        messages: [
          { role: 'user', content: '' },
          { role: 'assistant', content: '' },
        ],
      };

      expect(validator.validate(record, 1).kind).toBe('accepted');
    });
  });

  describe('check 1: messages field', () => {
    it('should reject a record without messages', () => {
      expect(reasonFor(validator, { prompt: 'hi' })).toBe("missing required field 'messages'");
    });

    it('should reject non-object records', () => {
      expect(reasonFor(validator, null)).toBe("missing required field 'messages'");
      expect(reasonFor(validator, 42)).toBe("missing required field 'messages'");
      expect(reasonFor(validator, false)).toBe("missing required field 'messages'");
      expect(reasonFor(validator, [{ role: 'user', content: 'hi' }])).toBe("missing required field 'messages'");
    });

    it('should reject messages that is not an array', () => {
      expect(reasonFor(validator, { messages: 'hi' })).toBe("field 'messages' must be an array, got string");
      expect(reasonFor(validator, { messages: {} })).toBe("field 'messages' must be an array, got object");
      expect(reasonFor(validator, { messages: null })).toBe("field 'messages' must be an array, got null");
    });

    it('should reject an empty messages array for the missing user role', () => {
      expect(reasonFor(validator, { messages: [] })).toBe("missing required role 'user'");
    });
  });

  describe('check 2: message objects', () => {
    it('should reject a non-object message with its index', () => {
      const record = { messages: [{ role: 'user', content: 'hi' }, 'assistant: yo'] };
      expect(reasonFor(validator, record)).toBe('messages[1] must be an object, got string');
    });

    it('should reject an array message', () => {
      expect(reasonFor(validator, { messages: [['user', 'hi']] })).toBe('messages[0] must be an object, got array');
    });
  });

  describe('check 3: role and content', () => {
    it('should reject a message without role', () => {
      const record = { messages: [{ content: 'hi' }] };
      expect(reasonFor(validator, record)).toBe("messages[0] is missing required field 'role'");
    });

    it('should reject a message without content', () => {
      const record: DatasetRecord = {
        messages: [
          { role: 'user', content: 'hi' },
          { role: 'assistant' },
        ],
      };
      expect(reasonFor(validator, record)).toBe("messages[1] is missing required field 'content'");
    });

    it('should reject non-string role or content', () => {
      expect(reasonFor(validator, { messages: [{ role: 1, content: 'hi' }] })).toBe(
        'messages[0].role must be a string, got number',
      );
      expect(reasonFor(validator, { messages: [{ role: 'user', content: null }] })).toBe(
        'messages[0].content must be a string, got null',
      );
    });

    it('should report structure problems before missing roles', () => {
      const record = { messages: [{ role: 'user', content: 'hi' }, { role: 'assistant', content: 7 }] };
      expect(reasonFor(validator, record)).toBe('messages[1].content must be a string, got number');
    });
  });

  describe('check 4: required roles', () => {
    it('should reject a conversation missing the assistant role', () => {
      const verdict = validator.validate({ messages: [{ role: 'user', content: 'hi' }] }, 7);
      expect(verdict).toEqual({ kind: 'rejected', lineNumber: 7, reason: "missing required role 'assistant'" });
    });

    it('should reject a conversation missing the user role', () => {
      const record = { messages: [{ role: 'assistant', content: 'yo' }] };
      expect(reasonFor(validator, record)).toBe("missing required role 'user'");
    });

    it('should compare roles case-sensitively', () => {
      const record = {
        messages: [
          { role: 'User', content: 'hi' },
          { role: 'assistant', content: 'yo' },
        ],
      };
      expect(reasonFor(validator, record)).toBe("missing required role 'user'");
    });

    it('should honour custom required roles', () => {
      const custom = new StructuralValidator({ requiredRoles: ['system', 'user', 'assistant'] });
      const record = {
        messages: [
          { role: 'user', content: 'hi' },
          { role: 'assistant', content: 'yo' },
        ],
      };

      expect(reasonFor(custom, record)).toBe("missing required role 'system'");
    });
  });

  it('should treat an empty split as fatal', () => {
    expect(validator.name).toBe('structural');
    expect(validator.emptyResultPolicy).toBe('fatal');
  });
});
