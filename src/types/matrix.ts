/** Matrix entry types: one concrete test configuration. */
export type ScenarioKind = "install" | "upgrade";

export type UpgradeSource = "stable" | "dev";

/** Free-form `--set key=value` overrides. */
export type ParameterSet = Readonly<Record<string, string>>;

export type EntryValues = Readonly<{
  /** Applied when installing the local chart (and when diffing against it). */
  local: ParameterSet;
  /** Applied when rendering for API validation. */
  validate: ParameterSet;
  /** Applied when installing the prior release in upgrade scenarios. */
  upgradeFrom: ParameterSet;
}>;

type MatrixEntryBase = Readonly<{
  id: string;
  clusterVersion: string;
  values: EntryValues;
  createFixtures: boolean;
  debugOnFailure: boolean;
  acceptTestFailure: boolean;
}>;

export type InstallEntry = MatrixEntryBase & Readonly<{ scenario: "install" }>;

export type UpgradeEntry = MatrixEntryBase & Readonly<{ scenario: "upgrade"; upgradeSource: UpgradeSource }>;

export type MatrixEntry = InstallEntry | UpgradeEntry;

export function isUpgrade(entry: MatrixEntry): entry is UpgradeEntry {
  return entry.scenario === "upgrade";
}
