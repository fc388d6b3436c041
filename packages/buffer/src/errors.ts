/** Raised when the backing region of a buffer cannot be obtained. */
export class BufferAllocationError extends Error {
	constructor(
		message: string,
		public readonly capacity: number,
		cause?: unknown,
	) {
		super(message, { cause });
		this.name = "BufferAllocationError";
	}
}

/** Raised by debug assertions when an append would pass the end of the region. */
export class BufferOverrunError extends RangeError {
	constructor(
		message: string,
		public readonly offset: number,
		public readonly dataSize: number,
		public readonly capacity: number,
	) {
		super(message);
		this.name = "BufferOverrunError";
	}
}

/** Raised by debug assertions when a moved-from buffer is used. */
export class BufferMovedError extends RangeError {
	constructor(message = "Buffer was moved from and can no longer be used") {
		super(message);
		this.name = "BufferMovedError";
	}
}
