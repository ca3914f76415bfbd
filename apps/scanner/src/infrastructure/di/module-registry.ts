import type { ConfigSchema } from '@ces/config';
import {
  AddressRangeMatcher,
  type ProbePort,
  type ProgressPort,
  type ScanStatePort,
  type TunnelPort,
} from '@ces/domain';
import type { ScannerOptions } from '@ces/scanner/cli/args';
import { HttpLatencyProbeAdapter } from '@ces/scanner/infrastructure/adapters/probe/http-latency-probe.adapter';
import { CliProgressAdapter } from '@ces/scanner/infrastructure/adapters/progress/cli-progress.adapter';
import { FileScanStateAdapter } from '@ces/scanner/infrastructure/adapters/storage/file-scan-state.adapter';
import { TunnelConfigBuilder } from '@ces/scanner/infrastructure/adapters/tunnel/tunnel-config.builder';
import { TunnelProcessAdapter } from '@ces/scanner/infrastructure/adapters/tunnel/tunnel-process.adapter';
import { Container } from './container';

export interface ScannerRegistry {
  ScannerConfig: ConfigSchema;
  ScannerOptions: ScannerOptions;
  AddressRangeMatcher: AddressRangeMatcher;
  TunnelConfigBuilder: TunnelConfigBuilder;
  TunnelPort: TunnelPort;
  ProbePort: ProbePort;
  ScanStatePort: ScanStatePort;
  ProgressPort: ProgressPort;
}

export type ScannerContainer = Container<ScannerRegistry>;

/** Wires the production adapters. Templates are read up front so a bad one fails before scanning. */
export async function scannerModuleRegistry(config: ConfigSchema, options: ScannerOptions): Promise<ScannerContainer> {
  const container = new Container<ScannerRegistry>();

  container.registerInstance('ScannerConfig', config);
  container.registerInstance('ScannerOptions', options);
  container.registerInstance('AddressRangeMatcher', new AddressRangeMatcher());

  // Tunnel
  container.registerInstance(
    'TunnelConfigBuilder',
    await TunnelConfigBuilder.fromDataDir(options.dataDir, {
      listenIp: config.probe.listenIp,
      portBase: config.probe.portBase,
    }),
  );
  container.register(
    'TunnelPort',
    () =>
      new TunnelProcessAdapter(container.resolve('TunnelConfigBuilder'), {
        config: config.tunnel,
        dataDir: options.dataDir,
      }),
  );

  // Probing
  container.register(
    'ProbePort',
    () => new HttpLatencyProbeAdapter(config.probe, { ignoreBodyWarning: options.ignoreBodyWarning }),
  );

  // Persistence & reporting
  container.register('ScanStatePort', () => new FileScanStateAdapter(options.dataDir));
  container.register('ProgressPort', () => new CliProgressAdapter());

  return container;
}
