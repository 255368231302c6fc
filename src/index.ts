export * from './infra/enhancement/index.js';
export * from './infra/transcription-models/index.js';
export * from './infra/config/index.js';
export * from './infra/events/index.js';
export { CancellationSlots } from './infra/cancellation/cancellation-slots.js';
export { compileSchema, describeViolations, formatViolations } from './infra/validation/schema-validator.js';
export type { SchemaViolation } from './infra/validation/schema-validator.js';
