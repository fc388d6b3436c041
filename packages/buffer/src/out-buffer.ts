import type { ILogger } from "@wirebuf/types";
import {
	bytesToHex,
	HOST_LITTLE_ENDIAN,
	toBytes,
	utf8ToBytes,
} from "@wirebuf/utils";
import { DEFAULT_BUFFER_CONFIG, MAX_BUFFER_CAPACITY } from "./defaults";
import {
	BufferAllocationError,
	BufferMovedError,
	BufferOverrunError,
} from "./errors";
import { OutBufferOptionsSchema } from "./schemas";
import type { BufferValue, OutBufferOptions } from "./types";

const EMPTY_REGION = new Uint8Array(0);

// Options already validated by another buffer, used by copy and move
class ResolvedOptions {
	constructor(
		readonly assertions: boolean,
		readonly logger: ILogger,
	) {}
}

const resolveOptions = (options: OutBufferOptions): ResolvedOptions => {
	if (options instanceof ResolvedOptions) return options;
	const parsed = OutBufferOptionsSchema.parse(options);
	return new ResolvedOptions(
		parsed.assertions ?? DEFAULT_BUFFER_CONFIG.assertions,
		parsed.logger ?? DEFAULT_BUFFER_CONFIG.logger,
	);
};

// 64-bit writes narrow numbers the way the 8 to 32-bit DataView setters do
const toBigInt = (value: bigint | number): bigint => {
	if (typeof value === "bigint") return value;
	return Number.isFinite(value) ? BigInt(Math.trunc(value)) : 0n;
};

/**
 * Fixed-capacity, append-only output buffer.
 *
 * Multi-byte integers are written in network byte order (big-endian).
 * Floats and doubles are written in the host's native byte order, verbatim,
 * which is what the wire format expects.
 *
 * Appends are not bounds checked: the caller sizes the buffer to exactly
 * the bytes it will write. Enable `assertions` to have every append
 * checked while debugging.
 *
 * @example
 * ```typescript
 * const buffer = new OutBuffer(7);
 * buffer.addUint8(1).addUint16(3).addString("ping");
 * buffer.toHex(); // "01000370696e67"
 * ```
 */
export class OutBuffer {
	private region: Uint8Array;
	private view: DataView;
	private offset = 0;
	private moved = false;
	private readonly assertions: boolean;
	private readonly logger: ILogger;

	/**
	 * @param capacity Exact number of bytes the buffer can hold (unsigned 32-bit)
	 * @throws BufferAllocationError when the region cannot be allocated
	 */
	constructor(capacity: number, options: OutBufferOptions = {}) {
		const resolved = resolveOptions(options);
		this.logger = resolved.logger;
		this.assertions = resolved.assertions;
		this.region = OutBuffer.allocate(capacity, this.logger);
		this.view = OutBuffer.viewOf(this.region);
	}

	private static allocate(capacity: number, logger: ILogger): Uint8Array {
		if (
			!Number.isInteger(capacity) ||
			capacity < 0 ||
			capacity > MAX_BUFFER_CAPACITY
		) {
			const err = new BufferAllocationError(
				`Buffer capacity must be an unsigned 32-bit integer, got ${capacity}`,
				capacity,
			);
			logger.error({ err, capacity }, "Failed to allocate output buffer");
			throw err;
		}
		try {
			return new Uint8Array(capacity);
		} catch (cause) {
			const err = new BufferAllocationError(
				`Unable to allocate ${capacity} bytes`,
				capacity,
				cause,
			);
			logger.error({ err, capacity }, "Failed to allocate output buffer");
			throw err;
		}
	}

	private static viewOf(region: Uint8Array): DataView {
		return new DataView(region.buffer, region.byteOffset, region.byteLength);
	}

	/**
	 * Duplicate `source` into a new region of the same capacity. The copy
	 * continues appending from the same offset and shares no memory.
	 */
	static copy(source: OutBuffer): OutBuffer {
		if (source.assertions && source.moved) {
			source.fail(new BufferMovedError());
		}
		const copy = new OutBuffer(source.capacity(), source.options());
		copy.region.set(source.bytes());
		copy.offset = source.offset;
		source.logger.trace(
			{ size: source.offset, capacity: source.capacity() },
			"Copied output buffer",
		);
		return copy;
	}

	/**
	 * Hand the region of `source` over to a new buffer without copying.
	 * `source` is left empty with zero capacity and must not be written to.
	 */
	static move(source: OutBuffer): OutBuffer {
		if (source.assertions && source.moved) {
			source.fail(new BufferMovedError());
		}
		const target = new OutBuffer(0, source.options());
		target.region = source.region;
		target.view = source.view;
		target.offset = source.offset;

		source.region = EMPTY_REGION;
		source.view = OutBuffer.viewOf(EMPTY_REGION);
		source.offset = 0;
		source.moved = true;

		target.logger.trace(
			{ size: target.offset, capacity: target.capacity() },
			"Moved output buffer",
		);
		return target;
	}

	private options(): ResolvedOptions {
		return new ResolvedOptions(this.assertions, this.logger);
	}

	clone(): OutBuffer {
		return OutBuffer.copy(this);
	}

	transfer(): OutBuffer {
		return OutBuffer.move(this);
	}

	/**
	 * The whole owned region. Only the first `size()` bytes hold written
	 * data; the rest is unspecified and must not be read.
	 */
	data(): Uint8Array {
		return this.region;
	}

	/** Number of bytes appended so far. */
	size(): number {
		return this.offset;
	}

	capacity(): number {
		return this.region.length;
	}

	remaining(): number {
		return this.region.length - this.offset;
	}

	isMoved(): boolean {
		return this.moved;
	}

	/** View of the written prefix of the region. */
	bytes(): Uint8Array {
		return this.region.subarray(0, this.offset);
	}

	toHex(): string {
		return bytesToHex(this.bytes());
	}

	/**
	 * Append `length` bytes of `span` verbatim.
	 * @param length Defaults to the full span
	 */
	addBytes(span: Uint8Array | readonly number[], length = span.length): this {
		const bytes = toBytes(span);
		if (this.assertions) {
			if (!Number.isInteger(length) || length < 0 || length > bytes.length) {
				this.fail(
					new RangeError(
						`Invalid span length=${length} for spanSize=${bytes.length}`,
					),
				);
			}
			this.assertWritable(length);
		}
		this.region.set(
			length === bytes.length ? bytes : bytes.subarray(0, length),
			this.offset,
		);
		this.offset += length;
		return this;
	}

	/** Append the UTF-8 encoding of `text`, without a length prefix or terminator. */
	addString(text: string): this {
		return this.addBytes(utf8ToBytes(text));
	}

	addUint8(value: number): this {
		if (this.assertions) this.assertWritable(1);
		this.view.setUint8(this.offset, value);
		this.offset += 1;
		return this;
	}

	addInt8(value: number): this {
		if (this.assertions) this.assertWritable(1);
		this.view.setInt8(this.offset, value);
		this.offset += 1;
		return this;
	}

	// integers: network byte order

	addUint16(value: number): this {
		if (this.assertions) this.assertWritable(2);
		this.view.setUint16(this.offset, value, false);
		this.offset += 2;
		return this;
	}

	addInt16(value: number): this {
		if (this.assertions) this.assertWritable(2);
		this.view.setInt16(this.offset, value, false);
		this.offset += 2;
		return this;
	}

	addUint32(value: number): this {
		if (this.assertions) this.assertWritable(4);
		this.view.setUint32(this.offset, value, false);
		this.offset += 4;
		return this;
	}

	addInt32(value: number): this {
		if (this.assertions) this.assertWritable(4);
		this.view.setInt32(this.offset, value, false);
		this.offset += 4;
		return this;
	}

	addUint64(value: bigint | number): this {
		if (this.assertions) this.assertWritable(8);
		this.view.setBigUint64(this.offset, toBigInt(value), false);
		this.offset += 8;
		return this;
	}

	addInt64(value: bigint | number): this {
		if (this.assertions) this.assertWritable(8);
		this.view.setBigInt64(this.offset, toBigInt(value), false);
		this.offset += 8;
		return this;
	}

	// floating point: host byte order, never swapped

	addFloat(value: number): this {
		if (this.assertions) this.assertWritable(4);
		this.view.setFloat32(this.offset, value, HOST_LITTLE_ENDIAN);
		this.offset += 4;
		return this;
	}

	addDouble(value: number): this {
		if (this.assertions) this.assertWritable(8);
		this.view.setFloat64(this.offset, value, HOST_LITTLE_ENDIAN);
		this.offset += 8;
		return this;
	}

	/** Append a tagged value using the encoding its `type` names. */
	add(value: BufferValue): this {
		switch (value.type) {
			case "bytes":
				return this.addBytes(value.value, value.length);
			case "string":
				return this.addString(value.value);
			case "uint8":
				return this.addUint8(value.value);
			case "int8":
				return this.addInt8(value.value);
			case "uint16":
				return this.addUint16(value.value);
			case "int16":
				return this.addInt16(value.value);
			case "uint32":
				return this.addUint32(value.value);
			case "int32":
				return this.addInt32(value.value);
			case "uint64":
				return this.addUint64(value.value);
			case "int64":
				return this.addInt64(value.value);
			case "float":
				return this.addFloat(value.value);
			case "double":
				return this.addDouble(value.value);
		}
	}

	addAll(values: Iterable<BufferValue>): this {
		for (const value of values) {
			this.add(value);
		}
		return this;
	}

	private assertWritable(size: number): void {
		if (this.moved) {
			this.fail(new BufferMovedError());
		}
		if (this.offset + size > this.region.length) {
			this.fail(
				new BufferOverrunError(
					`Write exceeds buffer capacity. offset=${this.offset}, dataSize=${size}, capacity=${this.region.length}`,
					this.offset,
					size,
					this.region.length,
				),
			);
		}
	}

	private fail(err: Error): never {
		this.logger.error({ err }, "Output buffer assertion failed");
		throw err;
	}
}
