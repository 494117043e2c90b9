import type { CommandRunner } from "../core/command-runner.js";
import type { Backends } from "../types/backends.js";
import type { ChartctlConfig } from "../types/config.js";
import { HelmChartEngine } from "./helm.js";
import { K3dClusterProvisioner } from "./k3d.js";
import {
  KubectlApiValidator,
  KubectlCertificateOracle,
  KubectlClusterInspector,
  KubectlFixtureApplier,
  KubectlReadinessOracle,
} from "./kubectl.js";
import { HttpReleaseMetadataSource } from "./release-metadata.js";
import { CommandTestSuiteRunner } from "./test-suite.js";

/** Wire the command-line backends for a validated config. */
export function createBackends(config: ChartctlConfig, runner: CommandRunner, opts: { provision: boolean }): Backends {
  return {
    provisioner: opts.provision
      ? new K3dClusterProvisioner(runner, { images: config.cluster?.images, imageTemplate: config.cluster?.image_template })
      : null,
    chart: new HelmChartEngine(runner, { chartName: config.chart.name, chartPath: config.chart.path, repo: config.chart.repo }),
    validator: new KubectlApiValidator(runner),
    readiness: new KubectlReadinessOracle(runner),
    certificates: new KubectlCertificateOracle(runner),
    fixtures: new KubectlFixtureApplier(runner),
    inspector: new KubectlClusterInspector(runner),
    tests: new CommandTestSuiteRunner(runner, config.tests.command),
    metadata: new HttpReleaseMetadataSource({ url: config.chart.metadata_url, chartName: config.chart.name }),
  };
}
