import type { DatasetRecord, JsonValue } from '../model/Record.js';
import type { ValidationVerdict } from '../model/ValidationVerdict.js';
import type { EmptyResultPolicy, RecordValidator } from '../ports/RecordValidator.js';
import { describeJsonType, isJsonObject } from '../model/Record.js';
import { accepted, rejected } from '../model/ValidationVerdict.js';

/** Roles every chat record must contain at least once. */
export const REQUIRED_ROLES: readonly string[] = ['user', 'assistant'];

export interface StructuralValidatorOptions {
  /** Roles that must each appear at least once. Default: `['user', 'assistant']`. */
  readonly requiredRoles?: readonly string[];
}

/**
 * Fixed chat-format check, no schema file needed.
 *
 * Checks run in order and stop at the first failure:
 * 1. `messages` exists and is an array
 * 2. every message is an object
 * 3. every message has string `role` and `content`
 * 4. every required role appears somewhere in the conversation
 *
 * A split where nothing passes is unusable for training, so the empty-result
 * policy is `'fatal'`.
 */
export class StructuralValidator implements RecordValidator {
  readonly name = 'structural';
  readonly emptyResultPolicy: EmptyResultPolicy = 'fatal';
  private readonly requiredRoles: readonly string[];

  constructor(options?: StructuralValidatorOptions) {
    this.requiredRoles = options?.requiredRoles ?? REQUIRED_ROLES;
  }

  validate(record: DatasetRecord, lineNumber: number): ValidationVerdict {
    const reason = this.findViolation(record);
    return reason === undefined ? accepted(record) : rejected(lineNumber, reason);
  }

  private findViolation(record: DatasetRecord): string | undefined {
    if (!isJsonObject(record) || !('messages' in record)) {
      return "missing required field 'messages'";
    }

    const messages = record['messages'];
    if (!Array.isArray(messages)) {
      return `field 'messages' must be an array, got ${describeJsonType(messages)}`;
    }

    const roles = new Set<string>();
    for (const [index, message] of messages.entries()) {
      const violation = this.checkMessage(message, index);
      if (violation !== undefined) return violation;
      if (isJsonObject(message) && typeof message['role'] === 'string') {
        roles.add(message['role']);
      }
    }

    const missing = this.requiredRoles.find((role) => !roles.has(role));
    if (missing !== undefined) {
      return `missing required role '${missing}'`;
    }
    return undefined;
  }

  private checkMessage(message: JsonValue, index: number): string | undefined {
    const at = `messages[${String(index)}]`;
    if (!isJsonObject(message)) {
      return `${at} must be an object, got ${describeJsonType(message)}`;
    }

    for (const key of ['role', 'content'] as const) {
      if (!(key in message)) {
        return `${at} is missing required field '${key}'`;
      }
      const value = message[key];
      if (typeof value !== 'string') {
        return `${at}.${key} must be a string, got ${describeJsonType(value)}`;
      }
    }
    return undefined;
  }
}
