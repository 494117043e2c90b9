import type { WorkloadStatus } from "../types/backends.js";

/** Kinds the readiness oracle understands, with the short names kubectl accepts. */
const KIND_ALIASES: Record<string, string> = {
  deploy: "Deployment",
  deployment: "Deployment",
  deployments: "Deployment",
  sts: "StatefulSet",
  statefulset: "StatefulSet",
  statefulsets: "StatefulSet",
  ds: "DaemonSet",
  daemonset: "DaemonSet",
  daemonsets: "DaemonSet",
};

type Json = Record<string, unknown>;

function isJson(value: unknown): value is Json {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function field(obj: unknown, ...keys: string[]): unknown {
  let current: unknown = obj;
  for (const key of keys) {
    if (!isJson(current)) return undefined;
    current = current[key];
  }
  return current;
}

function count(obj: unknown, ...keys: string[]): number {
  const value = field(obj, ...keys);
  return typeof value === "number" ? value : 0;
}

function text(obj: unknown, ...keys: string[]): string {
  const value = field(obj, ...keys);
  return typeof value === "string" ? value : "";
}

export type WorkloadRef = { kind: string; name: string };

/** Parse `deploy/hub` style references. */
export function parseWorkloadRef(ref: string): WorkloadRef | null {
  const [kind, name, ...rest] = ref.split("/");
  const canonical = KIND_ALIASES[kind.toLowerCase()];
  if (!canonical || !name || rest.length > 0) return null;
  return { kind: canonical, name };
}

export function isWorkloadReady(item: unknown): boolean {
  const kind = text(item, "kind");
  const generation = count(item, "metadata", "generation");
  const observed = count(item, "status", "observedGeneration");
  if (observed < generation) return false;

  switch (kind) {
    case "Deployment": {
      const desired = typeof field(item, "spec", "replicas") === "number" ? count(item, "spec", "replicas") : 1;
      return count(item, "status", "updatedReplicas") >= desired && count(item, "status", "readyReplicas") >= desired;
    }
    case "StatefulSet": {
      const desired = typeof field(item, "spec", "replicas") === "number" ? count(item, "spec", "replicas") : 1;
      return count(item, "status", "readyReplicas") >= desired;
    }
    case "DaemonSet":
      return count(item, "status", "numberReady") >= count(item, "status", "desiredNumberScheduled");
    default:
      return true;
  }
}

/**
 * Build a WorkloadStatus from a `kubectl get deployments,statefulsets,daemonsets,pods -o json`
 * list. With no refs every workload in the list counts; a named workload
 * missing from the list is not ready.
 */
export function workloadStatus(list: unknown, refs: readonly string[]): WorkloadStatus {
  const rawItems = field(list, "items");
  const items = Array.isArray(rawItems) ? rawItems : [];
  const workloads = items.filter((item) => text(item, "kind") !== "Pod");
  const pods = items.filter((item) => text(item, "kind") === "Pod");

  let ready: boolean;
  if (refs.length === 0) {
    ready = workloads.every(isWorkloadReady);
  } else {
    ready = refs.every((ref) => {
      const parsed = parseWorkloadRef(ref);
      if (!parsed) return false;
      const match = workloads.find((item) => text(item, "kind") === parsed.kind && text(item, "metadata", "name") === parsed.name);
      return match !== undefined && isWorkloadReady(match);
    });
  }

  const restartCounts: Record<string, number> = {};
  for (const pod of pods) {
    const statuses = field(pod, "status", "containerStatuses");
    if (!Array.isArray(statuses)) continue;
    restartCounts[text(pod, "metadata", "name")] = statuses.reduce<number>((sum, s) => sum + count(s, "restartCount"), 0);
  }

  return { ready, restartCounts };
}
