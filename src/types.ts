export type RequestConfig = {
  model: string;
  search_count: number;
  max_iterations: number;
  max_searches: number;
  auto_decide: boolean;
};

export type WorkerConfig = {
  command: string;
  args: string[];
  env?: Record<string, string>;
};

export type OutputMode = "human" | "quiet" | "json";

export type FileConfig = {
  worker?: Partial<WorkerConfig>;
  runsDir?: string;
  defaults?: Partial<RequestConfig>;
};

export type Config = {
  request: RequestConfig;
  worker: WorkerConfig;
  runsDir: string;
};
