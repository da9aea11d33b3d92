/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import type { VorbisDurationErrorKind } from './errors';

/**
 * Structured events emitted while a duration is being computed. Each event carries the file identity when the
 * computation was started from a file path.
 * @public
 */
export type DurationLogEvent = { filePath?: string } & (
	| { type: 'signature'; ok: boolean }
	| { type: 'identification-header'; offset: number; channelCount: number; sampleRate: number }
	| { type: 'file-size'; size: number }
	| {
		type: 'final-page';
		offset: number;
		granulePosition: bigint;
		/** Null if the page header runs past the end of the stream. */
		serialNumber: number | null;
		sequenceNumber: number | null;
	}
	| { type: 'duration'; seconds: number }
	| { type: 'skipped'; kind: VorbisDurationErrorKind; message: string }
);

/** @public */
export type DurationLogSink = (event: DurationLogEvent) => void;

const formatEvent = (event: DurationLogEvent) => {
	switch (event.type) {
		case 'signature': return `Ogg capture pattern ${event.ok ? 'found' : 'missing'}`;
		case 'identification-header':
			return `Channels: ${event.channelCount}, sample rate: ${event.sampleRate} Hz (header at ${event.offset})`;
		case 'file-size': return `File size: ${event.size} bytes`;
		case 'final-page': return `Final granule position: ${event.granulePosition} (page at ${event.offset})`;
		case 'duration': return `Calculated duration: ${event.seconds.toFixed(2)} seconds`;
		case 'skipped': return `Skipping file due to error (${event.kind}): ${event.message}`;
	}
};

/**
 * A log sink that writes events to the console. Skipped files go to `console.warn`, everything else to
 * `console.debug`.
 * @public
 */
export const consoleLogSink: DurationLogSink = (event) => {
	const prefix = event.filePath !== undefined ? `[${event.filePath}] ` : '';
	const line = prefix + formatEvent(event);

	if (event.type === 'skipped') {
		console.warn(line);
	} else {
		console.debug(line);
	}
};
