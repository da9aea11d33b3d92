/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import {
	computeVorbisDurationFromFile,
	type DurationReaderOptions,
	validateDurationReaderOptions,
} from './duration';
import { isVorbisDurationError, type VorbisDurationError } from './errors';
import { isPositiveInteger } from './misc';

export const DEFAULT_BATCH_CONCURRENCY = 4;

/**
 * Options for {@link measureDurations}.
 * @public
 */
export type BatchOptions = DurationReaderOptions & {
	/** How many files are measured at the same time. Defaults to 4. */
	concurrency?: number;
};

/** @public */
export type DurationResult =
	| { filePath: string; ok: true; duration: number }
	| { filePath: string; ok: false; error: VorbisDurationError };

/**
 * Measures the duration of every file in `filePaths`. Each file gets its own computation and file handle. A file that
 * can't be measured doesn't stop the batch: its result carries the error and a `skipped` event goes to the log sink.
 *
 * Results are in the same order as `filePaths`. Errors that aren't {@link VorbisDurationError}s are programming errors
 * and reject the returned promise.
 * @public
 */
export const measureDurations = async (
	filePaths: readonly string[],
	options: BatchOptions = {},
): Promise<DurationResult[]> => {
	if (!Array.isArray(filePaths) || filePaths.some(x => typeof x !== 'string')) {
		throw new TypeError('filePaths must be an array of strings.');
	}
	validateDurationReaderOptions(options);
	if (options.concurrency !== undefined && !isPositiveInteger(options.concurrency)) {
		throw new TypeError('options.concurrency, when provided, must be a positive integer.');
	}

	const { concurrency = DEFAULT_BATCH_CONCURRENCY, ...readerOptions } = options;
	const results: DurationResult[] = new Array(filePaths.length);
	let nextIndex = 0;

	const measure = async (filePath: string): Promise<DurationResult> => {
		try {
			const duration = await computeVorbisDurationFromFile(filePath, readerOptions);
			return { filePath, ok: true, duration };
		} catch (error) {
			if (!isVorbisDurationError(error)) {
				throw error;
			}

			readerOptions.log?.({ type: 'skipped', filePath, kind: error.kind, message: error.message });
			return { filePath, ok: false, error };
		}
	};

	const runWorker = async () => {
		while (nextIndex < filePaths.length) {
			const index = nextIndex++;
			results[index] = await measure(filePaths[index]);
		}
	};

	const workerCount = Math.min(concurrency, filePaths.length);
	await Promise.all(Array.from({ length: workerCount }, runWorker));

	return results;
};
