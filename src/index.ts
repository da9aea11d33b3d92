/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

export {
	computeVorbisDuration,
	computeVorbisDurationFromFile,
	DEFAULT_HEADER_SEARCH_SIZE,
	DEFAULT_TAIL_SEARCH_SIZE,
	getVorbisStreamInfo,
	VorbisDurationReader,
} from './duration';
export type { DurationReaderOptions, VorbisStreamInfo } from './duration';
export { DEFAULT_BATCH_CONCURRENCY, measureDurations } from './batch';
export type { BatchOptions, DurationResult } from './batch';
export {
	ImplausibleSampleRateError,
	isVorbisDurationError,
	NoOggPageFoundError,
	NotAnOggStreamError,
	SourceDisposedError,
	SourceIoError,
	TruncatedInputError,
	UnsupportedVorbisVersionError,
	VorbisDurationError,
	VorbisHeaderNotFoundError,
} from './errors';
export type { VorbisDurationErrorKind } from './errors';
export { consoleLogSink } from './log';
export type { DurationLogEvent, DurationLogSink } from './log';
export { BufferSource, FilePathSource, Source, StreamSource } from './source';
export type { StreamSourceOptions } from './source';
export { DEFAULT_MAX_SAMPLE_RATE, DEFAULT_MIN_SAMPLE_RATE } from './vorbis/vorbis-header';
export type { VorbisIdentificationHeader } from './vorbis/vorbis-header';
