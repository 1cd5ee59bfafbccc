/**
 * @arch hexagraph.core.domain
 * @intent:stateless
 *
 * Deterministic node identity.
 */

/**
 * Unsigned 64-bit vertex key derived from a component's fully-qualified name.
 */
export type NodeId = bigint;

const DJB2_SEED = 5381n;
const DJB2_MULTIPLIER = 33n;
const MASK_64 = (1n << 64n) - 1n;

const encoder = new TextEncoder();

/**
 * Hash a fully-qualified name into a NodeId.
 *
 * DJB2 over the UTF-8 bytes of the name, wrapping at 64 bits:
 * `hash = hash * 33 + byte`, starting from 5381.
 */
export function nodeIdFromName(name: string): NodeId {
  let hash = DJB2_SEED;
  for (const byte of encoder.encode(name)) {
    hash = (hash * DJB2_MULTIPLIER + BigInt(byte)) & MASK_64;
  }
  return hash;
}

/**
 * Type identity is the type's fully-qualified name.
 */
export function nodeIdFromTypeName(typeName: string): NodeId {
  return nodeIdFromName(typeName);
}

export function formatNodeId(id: NodeId): string {
  return `NodeId(${id})`;
}

const NODE_ID_PATTERN = /^(?:NodeId\((\d+)\)|(\d+))$/;

/**
 * Parse `12345` or `NodeId(12345)`. Returns null for anything else,
 * including values that do not fit in 64 bits.
 */
export function parseNodeId(text: string): NodeId | null {
  const match = NODE_ID_PATTERN.exec(text.trim());
  if (!match) return null;

  const digits = match[1] ?? match[2];
  if (digits === undefined) return null;

  const value = BigInt(digits);
  return value > MASK_64 ? null : value;
}
