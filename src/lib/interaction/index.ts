export { InteractionController } from './InteractionController';
export type { InteractionOptions } from './InteractionController';
export type {
  InteractionPhase,
  InteractionContext,
  InteractionOutcome,
  ItemOffsetDelta,
  ModifierState,
  PointerInput,
  WheelInput,
  KeyInput
} from './types';
