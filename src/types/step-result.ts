export type StepKind =
  | 'NotFound'
  | 'AmbiguousVerification'
  | 'ValidationRejected'
  | 'Timeout'
  | 'LoginFailed'
  | 'NavigationFailed'
  | 'FieldEmpty'
  | 'WriteNotConfirmed'
  | 'Unexpected';

export interface WorkflowResult {
  readonly site: string;
  readonly success: boolean;
  readonly durationMs: number;
  readonly error?: string;
  readonly errorKind?: StepKind;
  readonly details?: Readonly<Record<string, unknown>>;
}

export interface ExecutionSummary {
  readonly success: boolean;
  readonly results: readonly WorkflowResult[];
  readonly startedAt: number;
  readonly endedAt: number;
  readonly totalDurationMs: number;
}
