/**
 * Finite state machine for a pipeline run.
 *
 * Valid transitions:
 * - `CREATED` → `RUNNING` | `CANCELLED`
 * - `RUNNING` → `COMPLETED` | `CANCELLED` | `FAILED`
 * - `COMPLETED`, `CANCELLED`, `FAILED` → (terminal)
 */
export const PipelineStatus = {
  CREATED: 'CREATED',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  CANCELLED: 'CANCELLED',
  FAILED: 'FAILED',
} as const;

export type PipelineStatus = (typeof PipelineStatus)[keyof typeof PipelineStatus];

const VALID_TRANSITIONS: Record<PipelineStatus, readonly PipelineStatus[]> = {
  [PipelineStatus.CREATED]: [PipelineStatus.RUNNING, PipelineStatus.CANCELLED],
  [PipelineStatus.RUNNING]: [PipelineStatus.COMPLETED, PipelineStatus.CANCELLED, PipelineStatus.FAILED],
  [PipelineStatus.COMPLETED]: [],
  [PipelineStatus.CANCELLED]: [],
  [PipelineStatus.FAILED]: [],
};

/** Check whether a status transition is valid according to the pipeline FSM. */
export function canTransition(from: PipelineStatus, to: PipelineStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: PipelineStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}
