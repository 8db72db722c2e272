import { TenderService, loadConfig } from '@tenderflow/engine';

// One engine instance per server process; state lives only in memory.
let service: TenderService | null = null;

export function getTenderService(): TenderService {
  if (!service) {
    service = TenderService.fromConfig(loadConfig());
  }
  return service;
}

/** Swap the process-wide instance. Pass null to rebuild from the environment on next use. */
export function setTenderService(next: TenderService | null): void {
  service = next;
}
