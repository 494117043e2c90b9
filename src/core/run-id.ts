import fs from "node:fs";

/**
 * Generate a run ID.
 * Format: {branch}-{base_sha_7}-{YYYYMMDD}-{seq}
 */
export function generateRunId(branch: string, baseSha: string, artifactsDir: string, now: Date = new Date()): string {
  const safeBranch = branch.replace(/[^a-zA-Z0-9_-]/g, "-").slice(0, 30);
  const sha7 = baseSha.slice(0, 7).padEnd(7, "0");
  const date = now.toISOString().slice(0, 10).replace(/-/g, "");
  const prefix = `${safeBranch}-${sha7}-${date}`;
  return `${prefix}-${nextSeq(artifactsDir, prefix)}`;
}

function nextSeq(artifactsDir: string, prefix: string): string {
  if (!fs.existsSync(artifactsDir)) return "001";

  let maxSeq = 0;
  for (const entry of fs.readdirSync(artifactsDir, { withFileTypes: true })) {
    if (!entry.isDirectory() || !entry.name.startsWith(`${prefix}-`)) continue;
    const num = parseInt(entry.name.slice(prefix.length + 1), 10);
    if (!Number.isNaN(num) && num > maxSeq) maxSeq = num;
  }

  return String(maxSeq + 1).padStart(3, "0");
}
