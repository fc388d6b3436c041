import { OutBuffer } from "@wirebuf/buffer";
import { describe, expect, it } from "vitest";
import { createTestLogger } from "../helpers/logger";

const create = (capacity: number) =>
	new OutBuffer(capacity, { assertions: false, logger: createTestLogger() });

describe("OutBuffer construction", () => {
	it.each([0, 1, 15, 4096])("starts empty with capacity %i", (capacity) => {
		const buffer = create(capacity);

		expect(buffer.size()).toBe(0);
		expect(buffer.capacity()).toBe(capacity);
		expect(buffer.remaining()).toBe(capacity);
		expect(buffer.data().length).toBe(capacity);
		expect(buffer.bytes().length).toBe(0);
		expect(buffer.isMoved()).toBe(false);
	});
});

describe("OutBuffer appends", () => {
	it("encodes the frame fields in call order", () => {
		const buffer = create(15);

		buffer
			.addUint8(0x01)
			.addUint32(0x00000002)
			.addBytes([0xaa, 0xbb, 0xcc, 0xdd], 4)
			.addUint16(0x0003)
			.addString("test");

		expect(buffer.size()).toBe(15);
		expect(buffer.remaining()).toBe(0);
		expect(buffer.toHex()).toBe("0100000002aabbccdd000374657374");
		expect(buffer.data().subarray(0, buffer.size())).toEqual(
			Uint8Array.of(
				0x01, 0x00, 0x00, 0x00, 0x02, 0xaa, 0xbb, 0xcc, 0xdd, 0x00, 0x03, 0x74,
				0x65, 0x73, 0x74,
			),
		);
	});

	it("advances by the encoded size of each operand", () => {
		const buffer = create(64);
		const steps: [() => unknown, number][] = [
			[() => buffer.addUint8(1), 1],
			[() => buffer.addInt8(-1), 1],
			[() => buffer.addUint16(1), 2],
			[() => buffer.addInt16(-1), 2],
			[() => buffer.addUint32(1), 4],
			[() => buffer.addInt32(-1), 4],
			[() => buffer.addUint64(1n), 8],
			[() => buffer.addInt64(-1n), 8],
			[() => buffer.addFloat(1.5), 4],
			[() => buffer.addDouble(1.5), 8],
			[() => buffer.addString("héllo"), 6],
			[() => buffer.addBytes(Uint8Array.of(9, 9, 9)), 3],
		];

		let expected = 0;
		for (const [append, size] of steps) {
			append();
			expected += size;
			expect(buffer.size()).toBe(expected);
		}
		expect(buffer.size()).toBe(51);
	});

	it("copies only the requested length of a span", () => {
		const buffer = create(2);

		buffer.addBytes([1, 2, 3], 2);

		expect(buffer.toHex()).toBe("0102");
	});

	it("writes strings as UTF-8 without a terminator", () => {
		const buffer = create(5);

		buffer.addString("añb").addString("");

		expect(buffer.toHex()).toBe("61c3b162");
		expect(buffer.size()).toBe(4);
	});

	it("keeps the written prefix when the region is larger", () => {
		const buffer = create(10);

		buffer.addUint16(0xbeef);

		expect(buffer.bytes()).toEqual(Uint8Array.of(0xbe, 0xef));
		expect(buffer.data().length).toBe(10);
		expect(buffer.remaining()).toBe(8);
	});
});

describe("OutBuffer integer byte order", () => {
	const readBack = (buffer: OutBuffer) =>
		new DataView(
			buffer.data().buffer,
			buffer.data().byteOffset,
			buffer.size(),
		);

	it.each([
		[0, "0000"],
		[1, "0001"],
		[0xfffe, "fffe"],
		[0xffff, "ffff"],
	])("writes uint16 %i big-endian", (value, hex) => {
		const buffer = create(2).addUint16(value);

		expect(buffer.toHex()).toBe(hex);
		expect(readBack(buffer).getUint16(0, false)).toBe(value);
	});

	it.each([
		[0, "00000000"],
		[1, "00000001"],
		[0xfffffffe, "fffffffe"],
		[0xffffffff, "ffffffff"],
	])("writes uint32 %i big-endian", (value, hex) => {
		const buffer = create(4).addUint32(value);

		expect(buffer.toHex()).toBe(hex);
		expect(readBack(buffer).getUint32(0, false)).toBe(value);
	});

	it.each([
		[0n, "0000000000000000"],
		[1n, "0000000000000001"],
		[0xfffffffffffffffen, "fffffffffffffffe"],
		[0xffffffffffffffffn, "ffffffffffffffff"],
	])("writes uint64 %s big-endian", (value, hex) => {
		const buffer = create(8).addUint64(value);

		expect(buffer.toHex()).toBe(hex);
		expect(readBack(buffer).getBigUint64(0, false)).toBe(value);
	});

	it("writes signed values in two's complement", () => {
		const buffer = create(15)
			.addInt8(-1)
			.addInt16(-2)
			.addInt32(-0x80000000)
			.addInt64(-2n);

		expect(buffer.toHex()).toBe("fffffe80000000fffffffffffffffe");
	});

	it("accepts plain numbers for 64-bit values", () => {
		const buffer = create(16).addUint64(258).addInt64(-1);

		expect(buffer.toHex()).toBe("0000000000000102ffffffffffffffff");
	});

	it("narrows non-integer numbers for 64-bit values", () => {
		const buffer = create(32)
			.addUint64(1.5)
			.addInt64(Number.NaN)
			.addInt64(-2.7)
			.addUint64(2 ** 64 + 4096);

		expect(buffer.toHex()).toBe(
			"0000000000000001" +
				"0000000000000000" +
				"fffffffffffffffe" +
				"0000000000001000",
		);
	});

	it("writes infinite numbers as zero in 64-bit values", () => {
		const buffer = create(16)
			.addUint64(Number.POSITIVE_INFINITY)
			.addInt64(Number.NEGATIVE_INFINITY);

		expect(buffer.toHex()).toBe("0".repeat(32));
	});

	it.each([
		[-0x8000, "8000"],
		[-1, "ffff"],
		[0, "0000"],
		[0x7fff, "7fff"],
	])("writes int16 %i big-endian", (value, hex) => {
		const buffer = create(2).addInt16(value);

		expect(buffer.toHex()).toBe(hex);
		expect(readBack(buffer).getInt16(0, false)).toBe(value);
	});

	it.each([
		[-0x80000000, "80000000"],
		[-1, "ffffffff"],
		[0, "00000000"],
		[0x7fffffff, "7fffffff"],
	])("writes int32 %i big-endian", (value, hex) => {
		const buffer = create(4).addInt32(value);

		expect(buffer.toHex()).toBe(hex);
		expect(readBack(buffer).getInt32(0, false)).toBe(value);
	});

	it.each([
		[-0x8000000000000000n, "8000000000000000"],
		[-1n, "ffffffffffffffff"],
		[0n, "0000000000000000"],
		[0x7fffffffffffffffn, "7fffffffffffffff"],
	])("writes int64 %s big-endian", (value, hex) => {
		const buffer = create(8).addInt64(value);

		expect(buffer.toHex()).toBe(hex);
		expect(readBack(buffer).getBigInt64(0, false)).toBe(value);
	});

	it("wraps values outside the width like a narrowing cast", () => {
		const buffer = create(7).addUint8(0x1ff).addUint16(0x12345).addUint32(-1);

		expect(buffer.toHex()).toBe("ff2345ffffffff");
	});
});
