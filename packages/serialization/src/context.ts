import { CoercionRegistry, createCoercionRegistry } from './codecs/registry.js';
import { createDefaultCoercions } from './codecs/coercions.js';
import type { GroupConstants } from './domain/group.js';

/**
 * Indentation width of every JSON document the serializer writes
 */
export const JSON_INDENT = 2;

/**
 * Immutable bundle passed to every serialize/deserialize call
 */
export interface SerializationContext {
  readonly registry: CoercionRegistry;
}

/**
 * Either a ready registry, or the group bounds to build the default one with.
 * A registry carries its own bounds, so the two are exclusive.
 */
export type SerializationContextOptions =
  | { registry: CoercionRegistry; constants?: never }
  | { registry?: never; constants?: GroupConstants };

export function createSerializationContext(
  options: SerializationContextOptions = {}
): SerializationContext {
  const registry =
    options.registry ?? createCoercionRegistry(createDefaultCoercions(options.constants));
  return Object.freeze({ registry });
}

/**
 * Context built from the default coercions, with no group bounds
 */
export const defaultSerializationContext: SerializationContext = createSerializationContext();
