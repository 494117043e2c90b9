import YAML from "yaml";
import { CancelledError, ExecutionError, ValidationError } from "../errors.js";
import type { CommandRunner } from "../core/command-runner.js";
import type {
  ApiValidator,
  CertificateOracle,
  ClusterInspector,
  ClusterTarget,
  FixtureApplier,
  NamespaceReport,
  ReadinessOracle,
  WorkloadStatus,
} from "../types/backends.js";
import { err, ok, type Result } from "../types/result.js";
import { workloadStatus } from "./workloads.js";

/** Lines of container log kept per workload in the namespace report. */
const LOG_TAIL = 200;

function baseArgs(target: ClusterTarget, withNamespace = true): string[] {
  const args: string[] = [];
  if (target.kubeContext) args.push("--context", target.kubeContext);
  if (withNamespace) args.push("--namespace", target.namespace);
  return args;
}

/** Shared plumbing: every kubectl call goes through the same runner and binary. */
abstract class KubectlBackend {
  protected readonly runner: CommandRunner;
  protected readonly binary: string;

  constructor(runner: CommandRunner, binary = "kubectl") {
    this.runner = runner;
    this.binary = binary;
  }

  protected kubectl(
    name: string,
    target: ClusterTarget,
    args: string[],
    signal?: AbortSignal,
    input?: string,
  ): Promise<Result<string, ExecutionError | CancelledError>> {
    return this.runner
      .run({ name, command: this.binary, args: [...baseArgs(target), ...args], input }, signal)
      .then((res) => (res.ok ? ok(res.value.stdout) : res));
  }
}

/** Server-side dry run: the API server checks every object without persisting it. */
export class KubectlApiValidator extends KubectlBackend implements ApiValidator {
  async validateAgainstCluster(
    manifests: string,
    target: ClusterTarget,
    extraArgs: readonly string[],
    signal?: AbortSignal,
  ): Promise<Result<void, ValidationError | ExecutionError | CancelledError>> {
    const res = await this.kubectl(
      "kubectl apply --dry-run=server",
      target,
      ["apply", "--dry-run=server", "--validate=strict", ...extraArgs, "-f", "-"],
      signal,
      manifests,
    );
    if (res.ok) return ok(undefined);
    if (res.error instanceof CancelledError) return res;
    return err(new ValidationError("manifests rejected by the API server", res.error.stderr));
  }
}

export class KubectlReadinessOracle extends KubectlBackend implements ReadinessOracle {
  async status(target: ClusterTarget, workloads: readonly string[], signal?: AbortSignal): Promise<WorkloadStatus> {
    const res = await this.kubectl(
      "kubectl get workloads",
      target,
      ["get", "deployments,statefulsets,daemonsets,pods", "--output", "json"],
      signal,
    );
    // the waiter treats a throw as "not ready yet" and keeps polling
    if (!res.ok) throw res.error;
    const list: unknown = JSON.parse(res.value);
    return workloadStatus(list, workloads);
  }
}

/** A certificate counts as acquired once its secret holds a non-empty tls.crt. */
export class KubectlCertificateOracle extends KubectlBackend implements CertificateOracle {
  async acquired(target: ClusterTarget, secretName: string, signal?: AbortSignal): Promise<boolean> {
    const res = await this.kubectl(
      "kubectl get secret",
      target,
      ["get", "secret", secretName, "--ignore-not-found", "--output", "jsonpath={.data.tls\\.crt}"],
      signal,
    );
    if (!res.ok) throw res.error;
    return res.value.trim().length > 0;
  }
}

export class KubectlFixtureApplier extends KubectlBackend implements FixtureApplier {
  async apply(target: ClusterTarget, files: readonly string[], signal?: AbortSignal): Promise<Result<string, ExecutionError | CancelledError>> {
    // fixtures go in before the release creates its namespace
    const namespace = YAML.stringify({ apiVersion: "v1", kind: "Namespace", metadata: { name: target.namespace } });
    const created = await this.runner.run(
      { name: "kubectl apply namespace", command: this.binary, args: [...baseArgs(target, false), "apply", "-f", "-"], input: namespace },
      signal,
    );
    if (!created.ok) return created;

    const res = await this.kubectl("kubectl apply fixtures", target, ["apply", ...files.flatMap((f) => ["-f", f])], signal);
    if (!res.ok) return res;
    return ok(res.value.trim());
  }
}

/**
 * Namespace report for diagnostics: a resource overview, recent events, then
 * describe and logs for each important workload. Each section is collected
 * on its own; a failing command is noted and the rest still run.
 */
export class KubectlClusterInspector extends KubectlBackend implements ClusterInspector {
  async namespaceReport(target: ClusterTarget, importantWorkloads: readonly string[], signal?: AbortSignal): Promise<NamespaceReport> {
    const sections: Array<{ title: string; content: string }> = [];
    const errors: string[] = [];

    const queries: Array<{ title: string; args: string[] }> = [
      { title: "resources", args: ["get", "all,pvc,ingress,secrets", "--output", "wide"] },
      { title: "events", args: ["get", "events", "--sort-by=.lastTimestamp"] },
    ];
    for (const workload of importantWorkloads) {
      queries.push({ title: `describe ${workload}`, args: ["describe", workload] });
      queries.push({ title: `logs ${workload}`, args: ["logs", workload, "--all-containers", `--tail=${LOG_TAIL}`] });
    }

    for (const query of queries) {
      if (signal?.aborted) {
        errors.push(`${query.title}: skipped, diagnostics budget exhausted`);
        continue;
      }
      const res = await this.kubectl(`kubectl ${query.args[0]}`, target, query.args, signal);
      if (res.ok) {
        sections.push({ title: query.title, content: res.value });
      } else {
        errors.push(`${query.title}: ${res.error.message}`);
      }
    }

    return { sections, errors };
  }
}
