export {
  MovementService,
  ApplyMovementCommand,
  ReverseMovementCommand,
  MovementEngineOptions,
  DEFAULT_MOVEMENT_LIMIT,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  MovementSearchCriteria,
  PagedMovements,
  toMovementCreatedBody,
} from './movement.service';
export {
  IdempotencyGuard,
  IdempotencyKeys,
  MovementFingerprint,
  IdempotencyDecision,
  findFingerprintMismatch,
} from './movement.idempotency';
export { MovementController } from './movement.controller';
export { createMovementRoutes } from './movement.routes';
