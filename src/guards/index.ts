export { createMaxValueGuard } from './max-value.guard';
export type { MaxValueGuardOptions } from './max-value.guard';
export { createActorGuard } from './actor.guard';
export type { ActorGuardOptions } from './actor.guard';
export { requireNotesGuard } from './require-notes.guard';
