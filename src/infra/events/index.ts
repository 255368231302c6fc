export { EventBus } from './event-bus.js';
export type { AnyEventHandler, EventHandler, IEventBus } from './event-bus.js';

import { EventBus } from './event-bus.js';
import type { AppSettings } from '../config/settings-types.js';
import type { EnhancementState } from '../enhancement/orchestrator-state.js';
import type { LifecycleState } from '../transcription-models/lifecycle-state.js';
import type { ModelWarmStatus } from '../config/settings-types.js';

export interface EnhancementSnapshot {
  state: EnhancementState;
  settings: AppSettings['enhancement'];
}

export interface ModelLifecycleSnapshot {
  state: LifecycleState;
  selectedModel: string;
  warmStatus: ModelWarmStatus;
}

/**
 * Event name to payload map for the shared bus
 */
export interface VoxeditEvents {
  'enhancement.state_changed': EnhancementSnapshot;
  'models.state_changed': ModelLifecycleSnapshot;
}

export type VoxeditEventBus = EventBus<VoxeditEvents>;

// Singleton instance for process-wide state notifications
export const voxeditEventBus: VoxeditEventBus = new EventBus<VoxeditEvents>();
