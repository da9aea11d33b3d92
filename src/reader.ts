/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { isVorbisDurationError, SourceIoError, TruncatedInputError } from './errors';
import { assert } from './misc';
import type { ReadResult, Source } from './source';

/**
 * A window of bytes read from a source. `bufferPos` is a cursor into `bytes`; `filePos` is that cursor expressed as an
 * absolute position in the file.
 */
export class FileSlice {
	constructor(
		public readonly bytes: Uint8Array,
		public readonly view: DataView,
		/** The absolute file position of `bytes[0]`. */
		public readonly offset: number,
		/** The absolute file position at which the slice starts. */
		public readonly start: number,
		/** The absolute file position at which the slice ends (exclusive). */
		public readonly end: number,
	) {
		this.bufferPos = start - offset;
	}

	bufferPos: number;

	get filePos() {
		return this.offset + this.bufferPos;
	}

	set filePos(value: number) {
		this.bufferPos = value - this.offset;
	}

	get length() {
		return this.end - this.start;
	}

	get remainingLength() {
		return this.end - this.filePos;
	}

	skip(byteCount: number) {
		this.bufferPos += byteCount;
	}

	/** Returns the bytes of the whole slice, independent of the cursor. */
	getBytes() {
		const startPos = this.start - this.offset;
		return this.bytes.subarray(startPos, startPos + this.length);
	}
}

const ensureAvailable = (slice: FileSlice, byteCount: number) => {
	if (slice.remainingLength < byteCount) {
		throw new TruncatedInputError(slice.filePos, byteCount, Math.max(slice.remainingLength, 0));
	}
};

export const readBytes = (slice: FileSlice, length: number) => {
	ensureAvailable(slice, length);

	const bytes = slice.bytes.subarray(slice.bufferPos, slice.bufferPos + length);
	slice.bufferPos += length;

	return bytes;
};

export const readU8 = (slice: FileSlice) => {
	ensureAvailable(slice, 1);

	const value = slice.view.getUint8(slice.bufferPos);
	slice.bufferPos += 1;

	return value;
};

export const readU32Le = (slice: FileSlice) => {
	ensureAvailable(slice, 4);

	const value = slice.view.getUint32(slice.bufferPos, true);
	slice.bufferPos += 4;

	return value;
};

export const readU64Le = (slice: FileSlice) => {
	ensureAvailable(slice, 8);

	const value = slice.view.getBigUint64(slice.bufferPos, true);
	slice.bufferPos += 8;

	return value;
};

/**
 * Hands out slices of a {@link Source}. Any failure raised by the source itself surfaces as a {@link SourceIoError}.
 */
export class Reader {
	source: Source;

	constructor(source: Source) {
		this.source = source;
	}

	async getSize() {
		try {
			return await this.source.getSize();
		} catch (error) {
			throw wrapSourceError(error, 'Failed to determine the size of the source.');
		}
	}

	/** Returns a slice of exactly `length` bytes at `start`, or `null` if the file doesn't contain that many. */
	async requestSlice(start: number, length: number) {
		return this.requestSliceRange(start, length, length);
	}

	/**
	 * Returns a slice at `start` containing as many bytes as the file has, up to `maxLength`. Returns `null` if fewer
	 * than `minLength` bytes are available.
	 */
	async requestSliceRange(start: number, minLength: number, maxLength: number) {
		assert(Number.isInteger(start) && start >= 0);
		assert(minLength <= maxLength);

		const fileSize = await this.getSize();
		const end = Math.min(start + maxLength, fileSize);

		if (end - start < minLength) {
			return null;
		}
		if (end === start) {
			const empty = new Uint8Array(0);
			return new FileSlice(empty, new DataView(empty.buffer), start, start, start);
		}

		let result: ReadResult;
		try {
			result = await this.source._read(start, end);
		} catch (error) {
			throw wrapSourceError(error, `Failed to read bytes ${start} to ${end} from the source.`);
		}

		assert(result.offset <= start && result.offset + result.bytes.length >= end);
		return new FileSlice(result.bytes, result.view, result.offset, start, end);
	}
}

const wrapSourceError = (error: unknown, message: string) => {
	if (isVorbisDurationError(error)) {
		return error;
	}

	return new SourceIoError(message, { cause: error });
};
