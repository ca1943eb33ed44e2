export const PipelineStatus = {
  CREATED: 'CREATED',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
  CANCELLED: 'CANCELLED',
} as const;

export type PipelineStatus = (typeof PipelineStatus)[keyof typeof PipelineStatus];

const VALID_TRANSITIONS: Record<PipelineStatus, readonly PipelineStatus[]> = {
  [PipelineStatus.CREATED]: [PipelineStatus.RUNNING],
  [PipelineStatus.RUNNING]: [PipelineStatus.COMPLETED, PipelineStatus.FAILED, PipelineStatus.CANCELLED],
  [PipelineStatus.COMPLETED]: [],
  [PipelineStatus.FAILED]: [],
  [PipelineStatus.CANCELLED]: [],
};

export function canTransition(from: PipelineStatus, to: PipelineStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}
