/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import {
	NoOggPageFoundError,
	NotAnOggStreamError,
	SourceIoError,
	TruncatedInputError,
	VorbisHeaderNotFoundError,
} from './errors';
import type { DurationLogEvent, DurationLogSink } from './log';
import { isPositiveInteger } from './misc';
import {
	findLastCapturePattern,
	GRANULE_POSITION_OFFSET,
	hasCapturePattern,
	MIN_PAGE_HEADER_SIZE,
	readPageHeader,
} from './ogg/ogg-reader';
import { readU64Le, Reader } from './reader';
import { FilePathSource, Source } from './source';
import {
	DEFAULT_MAX_SAMPLE_RATE,
	DEFAULT_MIN_SAMPLE_RATE,
	findVorbisIdentificationHeader,
	parseVorbisIdentificationHeader,
} from './vorbis/vorbis-header';

export const DEFAULT_HEADER_SEARCH_SIZE = 8192;
export const DEFAULT_TAIL_SEARCH_SIZE = 65536;

/**
 * Options for {@link VorbisDurationReader}.
 * @public
 */
export type DurationReaderOptions = {
	/** How many bytes at the start of the stream are searched for the identification header. Defaults to 8192. */
	headerSearchSize?: number;
	/** How many bytes at the end of the stream are searched for the final page. Defaults to 65536. */
	tailSearchSize?: number;
	/** Lowest sample rate accepted as plausible, inclusive. Defaults to 8000. */
	minSampleRate?: number;
	/** Highest sample rate accepted as plausible, inclusive. Defaults to 192000. */
	maxSampleRate?: number;
	/** Receives a structured event for each step of the computation. */
	log?: DurationLogSink;
};

/**
 * Everything learned about a stream while computing its duration.
 * @public
 */
export type VorbisStreamInfo = {
	/** Duration in seconds, computed as `granulePosition / sampleRate`. */
	duration: number;
	sampleRate: number;
	channelCount: number;
	/** Granule position of the final page, i.e. the number of sample frames in the stream. */
	granulePosition: bigint;
	/** Absolute file position of the final page. */
	finalPageOffset: number;
	fileSize: number;
};

export const validateDurationReaderOptions = (options: DurationReaderOptions) => {
	if (!options || typeof options !== 'object') {
		throw new TypeError('options must be an object.');
	}
	if (options.headerSearchSize !== undefined && !isPositiveInteger(options.headerSearchSize)) {
		throw new TypeError('options.headerSearchSize, when provided, must be a positive integer.');
	}
	if (options.tailSearchSize !== undefined && !isPositiveInteger(options.tailSearchSize)) {
		throw new TypeError('options.tailSearchSize, when provided, must be a positive integer.');
	}
	if (options.minSampleRate !== undefined && !isPositiveInteger(options.minSampleRate)) {
		throw new TypeError('options.minSampleRate, when provided, must be a positive integer.');
	}
	if (options.maxSampleRate !== undefined && !isPositiveInteger(options.maxSampleRate)) {
		throw new TypeError('options.maxSampleRate, when provided, must be a positive integer.');
	}
	if ((options.minSampleRate ?? DEFAULT_MIN_SAMPLE_RATE) > (options.maxSampleRate ?? DEFAULT_MAX_SAMPLE_RATE)) {
		throw new TypeError('options.minSampleRate must not exceed options.maxSampleRate.');
	}
	if (options.log !== undefined && typeof options.log !== 'function') {
		throw new TypeError('options.log, when provided, must be a function.');
	}
};

/**
 * Computes the playback duration of Ogg/Vorbis streams by reading the sample rate from the Vorbis identification
 * header and the granule position from the last Ogg page. No audio is decoded.
 *
 * The reader holds no per-stream state, so one instance can serve any number of concurrent computations as long as
 * each is given its own source.
 * @public
 */
export class VorbisDurationReader {
	/** @internal */
	_headerSearchSize: number;
	/** @internal */
	_tailSearchSize: number;
	/** @internal */
	_minSampleRate: number;
	/** @internal */
	_maxSampleRate: number;
	/** @internal */
	_log: DurationLogSink | null;

	constructor(options: DurationReaderOptions = {}) {
		validateDurationReaderOptions(options);

		this._headerSearchSize = options.headerSearchSize ?? DEFAULT_HEADER_SEARCH_SIZE;
		this._tailSearchSize = options.tailSearchSize ?? DEFAULT_TAIL_SEARCH_SIZE;
		this._minSampleRate = options.minSampleRate ?? DEFAULT_MIN_SAMPLE_RATE;
		this._maxSampleRate = options.maxSampleRate ?? DEFAULT_MAX_SAMPLE_RATE;
		this._log = options.log ?? null;
	}

	/**
	 * Resolves with the duration of the stream in seconds. The source is not disposed; that stays the caller's job.
	 */
	async computeDuration(source: Source) {
		const info = await this.getStreamInfo(source);
		return info.duration;
	}

	/** Like {@link VorbisDurationReader.computeDuration}, but resolves with everything read along the way. */
	async getStreamInfo(source: Source, filePath?: string): Promise<VorbisStreamInfo> {
		if (!(source instanceof Source)) {
			throw new TypeError('source must be a Source.');
		}

		const log = (event: DurationLogEvent) => this._log?.({ ...event, filePath });
		const reader = new Reader(source);

		const signatureSlice = await reader.requestSliceRange(0, 0, 4);
		if (!signatureSlice || signatureSlice.length < 4) {
			throw new TruncatedInputError(0, 4, signatureSlice?.length ?? 0);
		}

		const signatureBytes = signatureSlice.getBytes();
		const signatureOk = hasCapturePattern(signatureBytes, 0);
		log({ type: 'signature', ok: signatureOk });
		if (!signatureOk) {
			throw new NotAnOggStreamError(signatureBytes.slice());
		}

		const fileSize = await reader.getSize();
		if (fileSize < MIN_PAGE_HEADER_SIZE) {
			throw new TruncatedInputError(0, MIN_PAGE_HEADER_SIZE, fileSize);
		}

		const headerSlice = await reader.requestSliceRange(0, 0, this._headerSearchSize);
		if (!headerSlice) {
			throw new TruncatedInputError(0, 1, 0);
		}

		const markerIndex = findVorbisIdentificationHeader(headerSlice.getBytes());
		if (markerIndex === -1) {
			throw new VorbisHeaderNotFoundError(headerSlice.length);
		}

		headerSlice.filePos = headerSlice.start + markerIndex;
		const header = parseVorbisIdentificationHeader(headerSlice, {
			minSampleRate: this._minSampleRate,
			maxSampleRate: this._maxSampleRate,
		});
		log({
			type: 'identification-header',
			offset: header.offset,
			channelCount: header.channelCount,
			sampleRate: header.sampleRate,
		});

		log({ type: 'file-size', size: fileSize });

		const tailLength = Math.min(fileSize, this._tailSearchSize);
		const tailSlice = await reader.requestSlice(fileSize - tailLength, tailLength);
		if (!tailSlice) {
			throw new TruncatedInputError(fileSize - tailLength, tailLength, 0);
		}

		const lastPageIndex = findLastCapturePattern(tailSlice.getBytes());
		if (lastPageIndex === -1) {
			throw new NoOggPageFoundError(tailLength);
		}

		const finalPageOffset = tailSlice.start + lastPageIndex;
		tailSlice.filePos = finalPageOffset + GRANULE_POSITION_OFFSET;
		const granulePosition = readU64Le(tailSlice);

		if (this._log) {
			// The full page header only feeds the trace
			tailSlice.filePos = finalPageOffset;
			const pageHeader = readPageHeader(tailSlice);
			log({
				type: 'final-page',
				offset: finalPageOffset,
				granulePosition,
				serialNumber: pageHeader?.serialNumber ?? null,
				sequenceNumber: pageHeader?.sequenceNumber ?? null,
			});
		}

		// Exact for granule positions below 2^53
		const duration = Number(granulePosition) / header.sampleRate;
		log({ type: 'duration', seconds: duration });

		return {
			duration,
			sampleRate: header.sampleRate,
			channelCount: header.channelCount,
			granulePosition,
			finalPageOffset,
			fileSize,
		};
	}
}

/**
 * Resolves with the duration in seconds of the Ogg/Vorbis stream held by `source`. The source is left open.
 * @public
 */
export const computeVorbisDuration = (source: Source, options: DurationReaderOptions = {}) => {
	return new VorbisDurationReader(options).computeDuration(source);
};

/**
 * Resolves with the full {@link VorbisStreamInfo} of the stream held by `source`. The source is left open.
 * @public
 */
export const getVorbisStreamInfo = (source: Source, options: DurationReaderOptions = {}) => {
	return new VorbisDurationReader(options).getStreamInfo(source);
};

/**
 * Opens the file at `filePath`, computes its duration and closes it again, whether or not the computation succeeded.
 * A failure to close the file rejects with a {@link SourceIoError}.
 * @public
 */
export const computeVorbisDurationFromFile = async (filePath: string, options: DurationReaderOptions = {}) => {
	const reader = new VorbisDurationReader(options);
	const source = new FilePathSource(filePath);

	try {
		const info = await reader.getStreamInfo(source, filePath);
		return info.duration;
	} finally {
		await closeSource(source);
	}
};

const closeSource = async (source: Source) => {
	try {
		await source.dispose();
	} catch (error) {
		throw new SourceIoError('Failed to close the source.', { cause: error });
	}
};
