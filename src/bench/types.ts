export const BACKEND_IDS = ["sqlite", "mysql", "mongodb", "redis"] as const;
export type BackendId = (typeof BACKEND_IDS)[number];

export type RunMode = "cold" | "warm";

export const PHASES = ["create", "read", "update", "delete"] as const;
export type Phase = (typeof PHASES)[number];

export type BenchRecord = {
  seq: number;
  name: string;
  price: number;
  quantity: number;
};

export type RecordPatch = Partial<Omit<BenchRecord, "seq">>;

// Every backend addresses records by a positive integer; see the adapters.
export type RecordId = number;

export type OperationSummary = {
  count: number;
  mean: number;
  median: number;
  min: number;
  max: number;
};

export type RunReportRow = {
  backend: BackendId;
  mode: RunMode;
  rows: number;
  repeats: number;
  timestamp: string;
  phases: Record<Phase, OperationSummary>;
};

// Timed outside the four fixed phases; reported in latest.json only.
export type SupplementaryMetrics = {
  readAll: OperationSummary;
};

export type BenchResult = RunReportRow & {
  supplementary: SupplementaryMetrics;
  packageVersion?: string;
  engineVersion?: string;
  environment: {
    node: string;
    os: string;
    cpu: string;
  };
  reportPath: string;
};

export interface BackendAdapter {
  readonly id: BackendId; // e.g., sqlite
  getPackageVersion(): string | undefined;
  getEngineVersion(): Promise<string | undefined>;

  connect(): Promise<void>;
  reset(): Promise<void>;
  create(record: BenchRecord): Promise<RecordId>;
  read(id: RecordId): Promise<BenchRecord | null>;
  /** Every record in the namespace, in address order. */
  readAll(): Promise<BenchRecord[]>;
  update(id: RecordId, patch: RecordPatch): Promise<boolean>;
  delete(id: RecordId): Promise<boolean>;
  close(): Promise<void>;
}

export type Logger = Pick<Console, "log" | "warn" | "error">;
