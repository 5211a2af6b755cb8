export type Run = {
  id: string;
  createdAt: Date;
  dir: string;
};

export type Job = {
  id: string;
  name: string;
  ordinal: number;
  path: string;
};

export type JobContext = {
  runId: string;
  jobId: string;
  jobName: string;
  runCreatedAt: Date;
};

export type FailureRecord = {
  runId: string;
  jobId: string;
  jobName: string;
  category: string;
  rule: string;
  timestamp: string;
  // 'run' when the line carried no usable timestamp
  timestampSource: 'line' | 'run';
  durationMs?: number;
  line: number;
  message: string;
};

export type AggregateBucket = {
  start: string;
  counts: Record<string, number>;
};

export type LogScan = {
  records: FailureRecord[];
  // "Attempt N" and "Command completed after N attempts" lines
  attempts: number;
};

export type JobScan = LogScan & {
  jobName: string;
};

export type JobSummary = {
  jobName: string;
  logs: number;
  failedLogs: number;
  failureRate: number;
  failures: number;
  attempts: number;
  // retry-wrapper failures per log, capped at the wrapper's attempt limit
  attemptFailures: number;
  attemptFailureRate: number;
  byCategory: Record<string, number>;
};

export type RunManifest = {
  id: string;
  created_at: string;
  status?: string | null;
  conclusion?: string | null;
  jobs: { id: string; name: string; index: number }[];
};
