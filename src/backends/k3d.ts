import type { CancelledError, ExecutionError } from "../errors.js";
import type { CommandRunner } from "../core/command-runner.js";
import type { ClusterHandle, ClusterProvisioner } from "../types/backends.js";
import { ok, type Result } from "../types/result.js";

export const DEFAULT_IMAGE_TEMPLATE = "rancher/k3s:{version}-k3s1";

export type K3dOptions = {
  /** Explicit image per version label, e.g. `v1.29: rancher/k3s:v1.29.4-k3s1`. */
  images?: Readonly<Record<string, string>>;
  /** Used for labels without an explicit image; `{version}` is replaced by the label. */
  imageTemplate?: string;
  binary?: string;
};

export function imageFor(versionLabel: string, opts: Pick<K3dOptions, "images" | "imageTemplate">): string {
  const explicit = opts.images?.[versionLabel];
  if (explicit) return explicit;
  return (opts.imageTemplate ?? DEFAULT_IMAGE_TEMPLATE).split("{version}").join(versionLabel);
}

/**
 * Disposable k3s clusters through k3d. The kubeconfig entry is merged without
 * switching the current context, so parallel runs address clusters only by
 * their own context.
 */
export class K3dClusterProvisioner implements ClusterProvisioner {
  private readonly runner: CommandRunner;
  private readonly opts: K3dOptions;
  private readonly binary: string;

  constructor(runner: CommandRunner, opts: K3dOptions = {}) {
    this.runner = runner;
    this.opts = opts;
    this.binary = opts.binary ?? "k3d";
  }

  async provision(versionLabel: string, name: string, signal?: AbortSignal): Promise<Result<ClusterHandle, ExecutionError | CancelledError>> {
    const res = await this.runner.run(
      {
        name: "k3d cluster create",
        command: this.binary,
        args: [
          "cluster",
          "create",
          name,
          "--image",
          imageFor(versionLabel, this.opts),
          "--wait",
          "--kubeconfig-update-default",
          "--kubeconfig-switch-context=false",
        ],
      },
      signal,
    );
    if (!res.ok) return res;
    return ok({ name, versionLabel, kubeContext: `k3d-${name}` });
  }

  async teardown(handle: ClusterHandle): Promise<Result<void, ExecutionError | CancelledError>> {
    // no signal: teardown runs after cancellation too
    const res = await this.runner.run({ name: "k3d cluster delete", command: this.binary, args: ["cluster", "delete", handle.name] });
    return res.ok ? ok(undefined) : res;
  }
}
