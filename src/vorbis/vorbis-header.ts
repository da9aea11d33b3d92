/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { ImplausibleSampleRateError, UnsupportedVorbisVersionError } from '../errors';
import { findSubarray } from '../misc';
import { type FileSlice, readU32Le, readU8 } from '../reader';

// Packet type 1 = identification header, followed by 'vorbis'
export const VORBIS_IDENTIFICATION_MARKER = new Uint8Array([0x01, 0x76, 0x6f, 0x72, 0x62, 0x69, 0x73]);

export const DEFAULT_MIN_SAMPLE_RATE = 8000;
export const DEFAULT_MAX_SAMPLE_RATE = 192000;

export type VorbisIdentificationHeader = {
	/** Absolute file position of the packet type byte. */
	offset: number;
	vorbisVersion: number;
	channelCount: number;
	sampleRate: number;
};

/**
 * Returns the index of the first identification header marker in `bytes`, or -1. This is a plain byte search; it
 * doesn't check that the match sits at the start of a packet, so payload bytes that happen to look like the marker
 * will match too.
 */
export const findVorbisIdentificationHeader = (bytes: Uint8Array) => {
	return findSubarray(bytes, VORBIS_IDENTIFICATION_MARKER);
};

/**
 * Reads the identification header whose marker starts at the slice's current position. Only the fields needed for
 * timing are decoded; bitrates, block sizes and the framing bit are left alone.
 */
export const parseVorbisIdentificationHeader = (
	slice: FileSlice,
	{
		minSampleRate = DEFAULT_MIN_SAMPLE_RATE,
		maxSampleRate = DEFAULT_MAX_SAMPLE_RATE,
	}: { minSampleRate?: number; maxSampleRate?: number } = {},
): VorbisIdentificationHeader => {
	const offset = slice.filePos;
	slice.skip(VORBIS_IDENTIFICATION_MARKER.length);

	const vorbisVersion = readU32Le(slice);
	if (vorbisVersion !== 0) {
		throw new UnsupportedVorbisVersionError(vorbisVersion);
	}

	const channelCount = readU8(slice);
	const sampleRate = readU32Le(slice);

	if (sampleRate < minSampleRate || sampleRate > maxSampleRate) {
		throw new ImplausibleSampleRateError(sampleRate, minSampleRate, maxSampleRate);
	}

	return { offset, vorbisVersion, channelCount, sampleRate };
};
