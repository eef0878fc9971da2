export const WORKFLOW_STATES = [
  'Init',
  'LoggedIn',
  'OnProfilePage',
  'FieldRead',
  'MutationReady',
  'Validated',
  'Written',
  'Verified',
  'Done',
] as const;

export type WorkflowState = (typeof WORKFLOW_STATES)[number];

export interface WorkflowOutcome {
  site: string;
  originalLength: number;
  contentLength: number;
  usedFallback: boolean;
  saveConfirmed: boolean;
}
