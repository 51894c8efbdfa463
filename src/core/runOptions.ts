type SharedRunOptions = {
  retryFailed: boolean;
  limit?: number;
  concurrency?: number;
  queries?: string[];
};

export type OnceRunOptions = SharedRunOptions & {
  mode: "once";
};

export type ScheduleRunOptions = SharedRunOptions & {
  mode: "schedule";
};

export type StatusRunOptions = {
  mode: "status";
};

export type RunOptions = OnceRunOptions | ScheduleRunOptions | StatusRunOptions;
