/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

/**
 * The kinds of failure a duration computation can end in. Every kind is recoverable at the call site: the stream
 * in question can't be measured, but nothing else is affected.
 * @public
 */
export type VorbisDurationErrorKind =
	| 'NotAnOggStream'
	| 'VorbisHeaderNotFound'
	| 'UnsupportedVorbisVersion'
	| 'ImplausibleSampleRate'
	| 'NoOggPageFound'
	| 'TruncatedInput'
	| 'SourceIoError';

/**
 * Base class of all errors thrown while computing the duration of a stream.
 * @public
 */
export abstract class VorbisDurationError extends Error {
	abstract readonly kind: VorbisDurationErrorKind;
}

/**
 * Thrown when the stream does not start with the `OggS` capture pattern.
 * @public
 */
export class NotAnOggStreamError extends VorbisDurationError {
	readonly kind = 'NotAnOggStream';

	constructor(public readonly signature: Uint8Array) {
		super(`Not an Ogg stream: expected capture pattern 'OggS', got [${[...signature].join(', ')}].`);
		this.name = 'NotAnOggStreamError';
	}
}

/**
 * Thrown when no Vorbis identification header marker appears in the head of the stream.
 * @public
 */
export class VorbisHeaderNotFoundError extends VorbisDurationError {
	readonly kind = 'VorbisHeaderNotFound';

	constructor(public readonly searchedBytes: number) {
		super(`Could not find a Vorbis identification header in the first ${searchedBytes} bytes.`);
		this.name = 'VorbisHeaderNotFoundError';
	}
}

/** @public */
export class UnsupportedVorbisVersionError extends VorbisDurationError {
	readonly kind = 'UnsupportedVorbisVersion';

	constructor(public readonly version: number) {
		super(`Unsupported Vorbis version: ${version}.`);
		this.name = 'UnsupportedVorbisVersionError';
	}
}

/** @public */
export class ImplausibleSampleRateError extends VorbisDurationError {
	readonly kind = 'ImplausibleSampleRate';

	constructor(
		public readonly sampleRate: number,
		public readonly minSampleRate: number,
		public readonly maxSampleRate: number,
	) {
		super(`Implausible sample rate: ${sampleRate} Hz (expected ${minSampleRate} to ${maxSampleRate} Hz).`);
		this.name = 'ImplausibleSampleRateError';
	}
}

/**
 * Thrown when the tail of the stream contains no Ogg page, which usually means the file is truncated or corrupt.
 * @public
 */
export class NoOggPageFoundError extends VorbisDurationError {
	readonly kind = 'NoOggPageFound';

	constructor(public readonly searchedBytes: number) {
		super(`Could not find an Ogg page in the last ${searchedBytes} bytes.`);
		this.name = 'NoOggPageFoundError';
	}
}

/** @public */
export class TruncatedInputError extends VorbisDurationError {
	readonly kind = 'TruncatedInput';

	constructor(
		public readonly offset: number,
		public readonly requested: number,
		public readonly available: number,
	) {
		super(
			`Unexpected end of input: needed ${requested} bytes at offset ${offset}, but only ${available} are`
			+ ` available.`,
		);
		this.name = 'TruncatedInputError';
	}
}

/**
 * Thrown when the underlying source fails to provide its size or its bytes. The original error is kept as `cause`.
 * @public
 */
export class SourceIoError extends VorbisDurationError {
	readonly kind = 'SourceIoError';

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'SourceIoError';
	}
}

/**
 * Thrown when reading from a source that has already been disposed.
 * @public
 */
export class SourceDisposedError extends SourceIoError {
	constructor(message = 'Source has been disposed.') {
		super(message);
		this.name = 'SourceDisposedError';
	}
}

/** @public */
export const isVorbisDurationError = (value: unknown): value is VorbisDurationError => {
	return value instanceof VorbisDurationError;
};
