/** Pipeline types: stages, their results, and the runs that own them. */
import type { ErrorCode, OrchestratorError } from "../errors.js";
import type { Result } from "./result.js";
import type { MatrixEntry } from "./matrix.js";
import type { Backends, ClusterHandle, ClusterTarget, Prerequisites } from "./backends.js";

export const STAGE_KINDS = [
  "provision",
  "prerequisites",
  "render",
  "lint-validate",
  "install-prior-release",
  "diff",
  "await-ready",
  "await-cert",
  "apply-fixture",
  "install-local",
  "run-tests",
  "collect-diagnostics",
] as const;

export type StageKind = (typeof STAGE_KINDS)[number];

export type FailurePolicy = "fatal" | "tolerant";

export type StageStatus = "ok" | "failed" | "skipped";

export type Verdict = "passed" | "failed" | "failed-tolerated" | "cancelled";

/** Settings a pipeline run needs beyond its entry. */
export type PipelineOptions = Readonly<{
  chartName: string;
  valuesFiles: readonly string[];
  localValuesFiles: readonly string[];
  lintValuesFile: string | null;
  workloads: readonly string[];
  importantWorkloads: readonly string[];
  certificateSecret: string | null;
  fixtures: readonly string[];
  suitePath: string;
  validateArgs: readonly string[];
  lint: boolean;
  provision: boolean;
  prerequisites: Prerequisites;
  readinessDeadlineMs: number;
  certificateDeadlineMs: number;
  maxRestarts: number;
  artifactsDir: string;
}>;

/** Identifiers resolved while a run progresses, threaded from stage to stage. */
export type PipelineContext = Readonly<{
  entry: MatrixEntry;
  options: PipelineOptions;
  releaseName: string;
  namespace: string;
  cluster: ClusterHandle | null;
  manifests: string | null;
  upgradeFromVersion: string | null;
  localChartVersion: string | null;
}>;

export type ContextUpdate = Partial<Pick<PipelineContext, "cluster" | "manifests" | "upgradeFromVersion" | "localChartVersion">>;

export type StepOutput = {
  output: string;
  update?: ContextUpdate;
};

export type StageGuard = (ctx: PipelineContext) => boolean;

type StageBase = Readonly<{
  name: string;
  kind: StageKind;
  policy: FailurePolicy | ((ctx: PipelineContext) => FailurePolicy);
  guard: StageGuard;
}>;

export type ActionStage = StageBase &
  Readonly<{
    mode: "action";
    invoke: (ctx: PipelineContext, backends: Backends, signal: AbortSignal) => Promise<Result<StepOutput, OrchestratorError>>;
  }>;

export type ReadinessTarget = Readonly<{
  name: string;
  target: ClusterTarget;
  workloads: readonly string[];
  deadlineMs: number;
  maxRestarts: number;
}>;

export type AwaitStage = StageBase &
  Readonly<{
    mode: "await";
    readiness: (ctx: PipelineContext) => ReadinessTarget;
  }>;

export type WaitCondition = Readonly<{
  name: string;
  deadlineMs: number;
  predicate: (backends: Backends, signal: AbortSignal) => Promise<boolean>;
}>;

export type ConditionStage = StageBase &
  Readonly<{
    mode: "condition";
    condition: (ctx: PipelineContext) => WaitCondition;
  }>;

export type DiagnosticsStage = StageBase & Readonly<{ mode: "diagnostics" }>;

export type ExecutableStage = ActionStage | AwaitStage | ConditionStage;

export type Stage = ExecutableStage | DiagnosticsStage;

export type StageResult = {
  name: string;
  kind: StageKind;
  policy: FailurePolicy;
  status: StageStatus;
  output: string;
  durationMs: number;
  attempts?: number;
  error?: { code: ErrorCode; message: string };
  skipReason?: string;
};

export type DebugMarker = {
  path: string;
  kubeContext: string | null;
  namespace: string;
  releaseName: string;
};

export type DiagnosticsBundle = {
  entryId: string;
  verdict: Verdict;
  collectedAt: string;
  namespace: string;
  sections: Array<{ title: string; content: string }>;
  debugSession: DebugMarker | null;
  errors: string[];
  path: string | null;
};

export type PipelineRun = {
  entry: MatrixEntry;
  releaseName: string;
  namespace: string;
  startedAt: string;
  finishedAt: string | null;
  results: StageResult[];
  verdict: Verdict;
  firstFatalStage: string | null;
  diagnostics: DiagnosticsBundle | null;
  teardownError: string | null;
};
