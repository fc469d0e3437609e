import '../src/config/loadEnv';

import { parseCliArgs } from '../src/config/cliArgs';
import { getTeslafiConfig } from '../src/config/teslafiConfig';
import { renderMetricBatch } from '../src/integrations/prometheus/registryRenderer';
import { createExporterService } from '../src/services/exporter.service';
import { SnapshotReconciler } from '../src/services/snapshotReconciler.service';
import { TeslafiService } from '../src/services/teslafi.service';

// Usage: npm run probe -- [--teslafi_api_token=…] [--raw]
const run = async () => {
  const args = process.argv.slice(2);
  const raw = args.includes('--raw');
  const config = getTeslafiConfig({ apiToken: parseCliArgs(args).apiToken });

  if (raw) {
    const reconciler = new SnapshotReconciler({
      source: new TeslafiService(config),
      fallbackCommand: config.fallbackCommand,
    });
    const reconciled = await reconciler.reconcile();
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(reconciled, null, 2));
    return;
  }

  const batch = await createExporterService(config).collect();
  const rendered = await renderMetricBatch(batch);
  // eslint-disable-next-line no-console
  console.log(rendered.body);
};

run().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exitCode = 1;
});
