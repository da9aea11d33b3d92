/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { findLastSubarray } from '../misc';
import { type FileSlice, readBytes, readU32Le, readU64Le, readU8 } from '../reader';

export const OGGS = new Uint8Array([0x4f, 0x67, 0x67, 0x53]); // 'OggS'
export const MIN_PAGE_HEADER_SIZE = 27;
/** Capture pattern (4), stream structure version (1), header type flags (1). */
export const GRANULE_POSITION_OFFSET = 6;

export type OggPageHeader = {
	headerStartPos: number;
	/** Always 0 for streams conforming to RFC 3533. */
	version: number;
	headerType: number;
	granulePosition: bigint;
	serialNumber: number;
	sequenceNumber: number;
	checksum: number;
	segmentCount: number;
	headerSize: number;
	dataSize: number;
	totalSize: number;
};

export const hasCapturePattern = (bytes: Uint8Array, offset: number) => {
	return bytes[offset] === 0x4f // 'O'
		&& bytes[offset + 1] === 0x67 // 'g'
		&& bytes[offset + 2] === 0x67 // 'g'
		&& bytes[offset + 3] === 0x53; // 'S'
};

/** Returns the offset of the rightmost capture pattern in `bytes`, or -1. */
export const findLastCapturePattern = (bytes: Uint8Array) => {
	return findLastSubarray(bytes, OGGS);
};

/**
 * Decodes the page header at the slice's current position. Returns null if there's no capture pattern there or if the
 * segment table runs past the end of the slice.
 */
export const readPageHeader = (slice: FileSlice): OggPageHeader | null => {
	const headerStartPos = slice.filePos;

	if (slice.remainingLength < MIN_PAGE_HEADER_SIZE) {
		return null;
	}

	const capturePattern = readBytes(slice, 4);
	if (!hasCapturePattern(capturePattern, 0)) {
		slice.filePos = headerStartPos;
		return null;
	}

	const version = readU8(slice);
	const headerType = readU8(slice);
	const granulePosition = readU64Le(slice);
	const serialNumber = readU32Le(slice);
	const sequenceNumber = readU32Le(slice);
	const checksum = readU32Le(slice);
	const segmentCount = readU8(slice);

	if (slice.remainingLength < segmentCount) {
		slice.filePos = headerStartPos;
		return null;
	}

	const lacingValues = readBytes(slice, segmentCount);
	let dataSize = 0;
	for (let i = 0; i < segmentCount; i++) {
		dataSize += lacingValues[i];
	}

	const headerSize = MIN_PAGE_HEADER_SIZE + segmentCount;

	return {
		headerStartPos,
		version,
		headerType,
		granulePosition,
		serialNumber,
		sequenceNumber,
		checksum,
		segmentCount,
		headerSize,
		dataSize,
		totalSize: headerSize + dataSize,
	};
};
