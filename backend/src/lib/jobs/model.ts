import type { StatusCode } from '@geoapi/shared';

export type JobStatus = StatusCode;

export const JOB_STATUSES: readonly JobStatus[] = ['accepted', 'running', 'successful', 'failed', 'dismissed'];

export const TERMINAL_STATUSES: readonly JobStatus[] = ['successful', 'failed', 'dismissed'];

// accepted -> failed covers jobs whose task never started (lost on restart).
const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  accepted: ['running', 'failed', 'dismissed'],
  running: ['successful', 'failed', 'dismissed'],
  successful: [],
  failed: [],
  dismissed: [],
};

export type JobInputs = Record<string, unknown>;
export type JobResult = Record<string, unknown>;

export interface Job {
  jobId: string;
  processId: string;
  status: JobStatus;
  message: string | null;
  /** 0-100 while running, 100 once successful */
  progress: number | null;
  inputs: JobInputs;
  /** Present iff status is successful. */
  result: JobResult | null;
  created: string;
  started: string | null;
  finished: string | null;
  updated: string;
  heartbeatAt: string | null;
}

export type NewJob = Pick<Job, 'jobId' | 'processId' | 'inputs' | 'created'>;

export type JobFilter = {
  processId?: string;
  status?: readonly JobStatus[];
};

export type PageRequest = {
  limit: number;
  offset: number;
};

export type JobPage = {
  jobs: Job[];
  total: number;
};

export type TransitionPatch = {
  message?: string;
  result?: JobResult;
  progress?: number;
};

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isJobStatus(value: unknown): value is JobStatus {
  return typeof value === 'string' && JOB_STATUSES.some(status => status === value);
}
