/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

export type MaybePromise<T> = T | Promise<T>;

export function assert(x: unknown): asserts x {
	if (!x) {
		throw new Error('Assertion failed.');
	}
}

export const isPositiveInteger = (x: unknown): x is number => {
	return typeof x === 'number' && Number.isInteger(x) && x > 0;
};

export const toUint8Array = (source: ArrayBuffer | ArrayBufferView): Uint8Array => {
	if (source instanceof Uint8Array && source.constructor === Uint8Array) {
		// We want a true Uint8Array, not something that extends it like Buffer
		return source;
	} else if (ArrayBuffer.isView(source)) {
		return new Uint8Array(source.buffer, source.byteOffset, source.byteLength);
	} else {
		return new Uint8Array(source);
	}
};

export const toDataView = (source: ArrayBuffer | ArrayBufferView): DataView => {
	if (source instanceof DataView) {
		return source;
	} else if (ArrayBuffer.isView(source)) {
		return new DataView(source.buffer, source.byteOffset, source.byteLength);
	} else {
		return new DataView(source);
	}
};

const matchesAt = (haystack: Uint8Array, needle: Uint8Array, offset: number) => {
	for (let j = 0; j < needle.length; j++) {
		if (haystack[offset + j] !== needle[j]) {
			return false;
		}
	}

	return true;
};

/** Returns the index of the first occurrence of `needle` in `haystack`, or -1. */
export const findSubarray = (haystack: Uint8Array, needle: Uint8Array) => {
	for (let i = 0; i <= haystack.length - needle.length; i++) {
		if (matchesAt(haystack, needle, i)) {
			return i;
		}
	}

	return -1;
};

/** Returns the index of the last occurrence of `needle` in `haystack`, or -1. */
export const findLastSubarray = (haystack: Uint8Array, needle: Uint8Array) => {
	for (let i = haystack.length - needle.length; i >= 0; i--) {
		if (matchesAt(haystack, needle, i)) {
			return i;
		}
	}

	return -1;
};
