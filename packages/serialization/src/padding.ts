/**
 * Fixed-size padded blocks.
 *
 * Layout of a block of `size` bytes:
 *   [0, 2)                      big-endian padding length p
 *   [2, size - p)               payload
 *   [size - p, size)            PAD_BYTE filler
 *
 * The indicator stores the filler length, so the payload end is
 * `size - p` for every block size class.
 */

import { MalformedBlockError, SerializationError, SerializationErrorCode, TruncationError } from './types.js';
import type { SerializationContext } from './context.js';
import type { TypeDescriptor } from './descriptors.js';
import { fromRaw, toRaw } from './serialize.js';
import { logger as rootLogger } from './logger.js';

const logger = rootLogger.child('padding');

export const PAD_INDICATOR_SIZE = 2;
export const PAD_BYTE = 0x00;

/**
 * Supported total block sizes
 */
export enum BlockSizeClass {
  Bytes512 = 512
}

export function isBlockSizeClass(size: number): size is BlockSizeClass {
  return Object.values(BlockSizeClass).some(value => value === size);
}

/**
 * Largest payload a block of this size holds
 */
export function blockCapacity(size: BlockSizeClass): number {
  assertBlockSize(size);
  return size - PAD_INDICATOR_SIZE;
}

function assertBlockSize(size: number): void {
  if (!isBlockSizeClass(size)) {
    throw new SerializationError(
      SerializationErrorCode.INVALID_BLOCK_SIZE,
      `Unsupported block size ${size}`,
      undefined,
      { size }
    );
  }
}

/**
 * Pad a payload into a block of exactly `size` bytes.
 *
 * With `allowTruncation` a payload longer than the block capacity is cut to
 * the capacity; the dropped bytes cannot be recovered.
 */
export function addPadding(
  payload: Uint8Array,
  size: BlockSizeClass,
  allowTruncation = false
): Uint8Array {
  const capacity = blockCapacity(size);
  let messageLength = payload.length;

  if (messageLength > capacity) {
    if (!allowTruncation) {
      throw new TruncationError(messageLength, capacity);
    }
    logger.warn('Truncating payload to block capacity', {
      payloadLength: messageLength,
      capacity,
      droppedBytes: messageLength - capacity
    });
    messageLength = capacity;
  }

  const paddingLength = capacity - messageLength;
  const block = new Uint8Array(size);
  new DataView(block.buffer).setUint16(0, paddingLength, false);
  block.set(payload.subarray(0, messageLength), PAD_INDICATOR_SIZE);
  block.fill(PAD_BYTE, PAD_INDICATOR_SIZE + messageLength);

  return block;
}

/**
 * Recover the payload of a padded block
 */
export function removePadding(block: Uint8Array, size: BlockSizeClass): Uint8Array {
  const capacity = blockCapacity(size);

  if (block.length !== size) {
    throw new MalformedBlockError(`Invalid block size: expected ${size}, got ${block.length}`, {
      expected: size,
      actual: block.length
    });
  }

  const paddingLength = new DataView(block.buffer, block.byteOffset, block.byteLength).getUint16(
    0,
    false
  );
  if (paddingLength > capacity) {
    throw new MalformedBlockError(
      `Padding indicator ${paddingLength} exceeds block capacity ${capacity}`,
      { paddingLength, capacity }
    );
  }

  const messageEnd = size - paddingLength;
  return block.slice(PAD_INDICATOR_SIZE, messageEnd);
}

/**
 * Serialize a value and pad its UTF-8 JSON into a block
 */
export function paddedEncode<T>(
  descriptor: TypeDescriptor<T>,
  value: T,
  size: BlockSizeClass,
  context: SerializationContext
): Uint8Array {
  return addPadding(new TextEncoder().encode(toRaw(descriptor, value, context)), size);
}

/**
 * Unpad a block and deserialize its JSON payload
 */
export function paddedDecode<T>(
  descriptor: TypeDescriptor<T>,
  block: Uint8Array,
  size: BlockSizeClass,
  context: SerializationContext
): T {
  return fromRaw(descriptor, removePadding(block, size), context);
}
