import chalk from 'chalk';
import { EnhancementOrchestrator } from '../../infra/enhancement/enhancement-orchestrator.js';
import { FileSettingsStore } from '../../infra/config/settings-store.js';
import type { ProviderKind } from '../../infra/enhancement/provider-types.js';
import { PROVIDER_KINDS, isProviderKind } from '../../infra/enhancement/provider-types.js';

let orchestrator: EnhancementOrchestrator | null = null;

/**
 * Orchestrator over ~/.config/voxedit/settings.json, created on first use
 */
export function getOrchestrator(): EnhancementOrchestrator {
  if (!orchestrator) {
    orchestrator = new EnhancementOrchestrator({ settings: new FileSettingsStore() });
  }
  return orchestrator;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function fail(message: string): never {
  console.error(chalk.red(message));
  process.exit(1);
}

export function parseProviderKind(value: string): ProviderKind {
  const normalized = value.trim().toLowerCase();
  if (!isProviderKind(normalized)) {
    fail(`Unknown provider: ${value} (expected one of ${PROVIDER_KINDS.join(', ')})`);
  }
  return normalized;
}

/**
 * Show the first and last characters of a key only
 */
export function maskSecret(secret: string): string {
  if (secret.length <= 8) {
    return '*'.repeat(secret.length);
  }
  return `${secret.slice(0, 4)}…${secret.slice(-4)}`;
}

export function formatPercent(fraction: number): string {
  return `${Math.round(fraction * 100)}%`;
}
