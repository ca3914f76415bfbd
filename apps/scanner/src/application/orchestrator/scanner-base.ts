import type { ConfigSchema } from '@ces/config';
import type { AddressRangeMatcher, ProbePort, ProgressPort, ScanStatePort, TunnelPort } from '@ces/domain';
import type { ScannerOptions } from '@ces/scanner/cli/args';
import type { ScannerContainer } from '@ces/scanner/infrastructure/di/module-registry';

export abstract class ScannerBase {
  protected readonly config: ConfigSchema;
  protected readonly options: ScannerOptions;

  constructor(protected readonly container: ScannerContainer) {
    this.config = container.resolve('ScannerConfig');
    this.options = container.resolve('ScannerOptions');
  }

  // ============================================================================
  // Ports
  // ============================================================================

  protected getTunnel(): TunnelPort {
    return this.container.resolve('TunnelPort');
  }

  protected getProbe(): ProbePort {
    return this.container.resolve('ProbePort');
  }

  protected getState(): ScanStatePort {
    return this.container.resolve('ScanStatePort');
  }

  protected getProgress(): ProgressPort {
    return this.container.resolve('ProgressPort');
  }

  protected getMatcher(): AddressRangeMatcher {
    return this.container.resolve('AddressRangeMatcher');
  }
}
