import { describe, expect, test } from 'vitest';
import {
	computeVorbisDuration,
	getVorbisStreamInfo,
	VorbisDurationReader,
} from '../../src/duration.js';
import {
	ImplausibleSampleRateError,
	NoOggPageFoundError,
	NotAnOggStreamError,
	SourceDisposedError,
	SourceIoError,
	TruncatedInputError,
	UnsupportedVorbisVersionError,
	VorbisHeaderNotFoundError,
} from '../../src/errors.js';
import type { DurationLogEvent } from '../../src/log.js';
import { BufferSource, StreamSource } from '../../src/source.js';
import { VORBIS_IDENTIFICATION_MARKER } from '../../src/vorbis/vorbis-header.js';
import {
	ascii,
	buildOggPage,
	buildVorbisFile,
	concatBytes,
	fillerBytes,
} from './helpers/ogg-builder.js';

const u32Le = (value: number) => {
	const bytes = new Uint8Array(4);
	new DataView(bytes.buffer).setUint32(0, value, true);
	return bytes;
};

describe('computeVorbisDuration', () => {
	test('2-channel 44.1 kHz stream with granule position 2,205,000 lasts exactly 50 seconds', async () => {
		const { bytes } = buildVorbisFile({ channelCount: 2, sampleRate: 44100, finalGranule: 2_205_000n });

		expect(await computeVorbisDuration(new BufferSource(bytes))).toBe(50);
	});

	test('duration is the final granule position divided by the sample rate', async () => {
		const { bytes } = buildVorbisFile({ sampleRate: 48000, finalGranule: 1_234_567n });

		expect(await computeVorbisDuration(new BufferSource(bytes))).toBe(1_234_567 / 48000);
	});

	test('stream info carries everything read along the way', async () => {
		const file = buildVorbisFile({ channelCount: 1, sampleRate: 22050, finalGranule: 441_000n });

		const info = await getVorbisStreamInfo(new BufferSource(file.bytes));
		expect(info).toEqual({
			duration: 20,
			sampleRate: 22050,
			channelCount: 1,
			granulePosition: 441_000n,
			finalPageOffset: file.finalPageOffset,
			fileSize: file.bytes.length,
		});
	});

	test('granule position is read as an unsigned 64-bit integer', async () => {
		const { bytes } = buildVorbisFile({ sampleRate: 44100, finalGranule: 0xffff_ffff_ffff_ffffn });

		const duration = await computeVorbisDuration(new BufferSource(bytes));
		expect(duration).toBe(Number(0xffff_ffff_ffff_ffffn) / 44100);
		expect(duration).toBeGreaterThan(0);
	});

	test('an empty final granule position yields a zero duration', async () => {
		const { bytes } = buildVorbisFile({ finalGranule: 0n });

		expect(await computeVorbisDuration(new BufferSource(bytes))).toBe(0);
	});

	test('repeated computations on the same source agree', async () => {
		const { bytes } = buildVorbisFile({ sampleRate: 32000, finalGranule: 100_001n });
		const source = new BufferSource(bytes);
		const reader = new VorbisDurationReader();

		const first = await reader.computeDuration(source);
		const second = await reader.computeDuration(source);

		expect(first).toBe(100_001 / 32000);
		expect(second).toBe(first);
	});

	test('concurrent computations with separate sources are independent', async () => {
		const reader = new VorbisDurationReader();
		const files = [
			buildVorbisFile({ sampleRate: 8000, finalGranule: 8000n }),
			buildVorbisFile({ sampleRate: 16000, finalGranule: 80_000n }),
			buildVorbisFile({ sampleRate: 96000, finalGranule: 48_000n }),
		];

		const durations = await Promise.all(files.map(file => reader.computeDuration(new BufferSource(file.bytes))));
		expect(durations).toEqual([1, 5, 0.5]);
	});
});

describe('container signature', () => {
	test('rejects a stream not starting with OggS', async () => {
		const bytes = concatBytes(ascii('RIFF'), buildVorbisFile().bytes);

		const promise = computeVorbisDuration(new BufferSource(bytes));
		await expect(promise).rejects.toThrow(NotAnOggStreamError);
		await expect(promise).rejects.toMatchObject({
			kind: 'NotAnOggStream',
			signature: new Uint8Array([0x52, 0x49, 0x46, 0x46]),
		});
	});

	test('rejects an otherwise valid file whose first byte is damaged', async () => {
		const { bytes } = buildVorbisFile();
		bytes[0] = 0x6f; // 'o'

		await expect(computeVorbisDuration(new BufferSource(bytes))).rejects.toThrow(NotAnOggStreamError);
	});

	test('a stream too short for a signature is truncated', async () => {
		await expect(computeVorbisDuration(new BufferSource(ascii('Ogg')))).rejects.toMatchObject({
			kind: 'TruncatedInput',
			offset: 0,
			requested: 4,
			available: 3,
		});
		await expect(computeVorbisDuration(new BufferSource(new Uint8Array(0)))).rejects.toMatchObject({
			kind: 'TruncatedInput',
			available: 0,
		});
	});

	test('a stream shorter than one page header is truncated', async () => {
		const bytes = concatBytes(ascii('OggS'), new Uint8Array(16));

		const promise = computeVorbisDuration(new BufferSource(bytes));
		await expect(promise).rejects.toThrow(TruncatedInputError);
		await expect(promise).rejects.toMatchObject({ offset: 0, requested: 27, available: 20 });
	});
});

describe('identification header', () => {
	test('fails when no header marker is present', async () => {
		const bytes = buildOggPage({ sequenceNumber: 0, headerType: 0x02, body: fillerBytes(500) });

		const promise = computeVorbisDuration(new BufferSource(bytes));
		await expect(promise).rejects.toThrow(VorbisHeaderNotFoundError);
		await expect(promise).rejects.toMatchObject({ kind: 'VorbisHeaderNotFound', searchedBytes: bytes.length });
	});

	test('only the first 8192 bytes are searched', async () => {
		const { bytes } = buildVorbisFile({ leadingBodies: [fillerBytes(9000)], finalGranule: 441_000n });

		await expect(computeVorbisDuration(new BufferSource(bytes))).rejects.toMatchObject({
			kind: 'VorbisHeaderNotFound',
			searchedBytes: 8192,
		});
		expect(await computeVorbisDuration(new BufferSource(bytes), { headerSearchSize: 16384 })).toBe(10);
	});

	test('the first marker wins, even outside a header packet', async () => {
		const decoy = concatBytes(
			VORBIS_IDENTIFICATION_MARKER,
			u32Le(0),
			new Uint8Array([1]),
			u32Le(22050),
			fillerBytes(20),
		);
		const { bytes } = buildVorbisFile({ leadingBodies: [decoy], sampleRate: 44100, finalGranule: 441_000n });

		expect(await computeVorbisDuration(new BufferSource(bytes))).toBe(20);
	});

	test('rejects Vorbis version 1', async () => {
		const { bytes } = buildVorbisFile({ vorbisVersion: 1 });

		const promise = computeVorbisDuration(new BufferSource(bytes));
		await expect(promise).rejects.toThrow(UnsupportedVorbisVersionError);
		await expect(promise).rejects.toMatchObject({ kind: 'UnsupportedVorbisVersion', version: 1 });
	});

	test('rejects the largest version value', async () => {
		const { bytes } = buildVorbisFile({ vorbisVersion: 0xffffffff });

		await expect(computeVorbisDuration(new BufferSource(bytes))).rejects.toMatchObject({
			kind: 'UnsupportedVorbisVersion',
			version: 4294967295,
		});
	});

	test.each([7999, 192001, 0])('rejects sample rate %i', async (sampleRate) => {
		const { bytes } = buildVorbisFile({ sampleRate });

		const promise = computeVorbisDuration(new BufferSource(bytes));
		await expect(promise).rejects.toThrow(ImplausibleSampleRateError);
		await expect(promise).rejects.toMatchObject({ kind: 'ImplausibleSampleRate', sampleRate });
	});

	test.each([8000, 192000])('accepts sample rate %i', async (sampleRate) => {
		const { bytes } = buildVorbisFile({ sampleRate, finalGranule: BigInt(sampleRate * 3) });

		expect(await computeVorbisDuration(new BufferSource(bytes))).toBe(3);
	});

	test('sample rate bounds can be configured', async () => {
		const { bytes } = buildVorbisFile({ sampleRate: 7999, finalGranule: 7999n });

		expect(await computeVorbisDuration(new BufferSource(bytes), { minSampleRate: 4000 })).toBe(1);
		await expect(computeVorbisDuration(new BufferSource(bytes), { minSampleRate: 7000, maxSampleRate: 7500 }))
			.rejects.toMatchObject({ sampleRate: 7999, minSampleRate: 7000, maxSampleRate: 7500 });
	});

	test('a header cut off before the sample rate is truncated', async () => {
		const bytes = buildOggPage({
			sequenceNumber: 0,
			headerType: 0x02,
			body: concatBytes(VORBIS_IDENTIFICATION_MARKER, new Uint8Array([0, 0])),
		});
		expect(bytes.length).toBe(37);

		await expect(computeVorbisDuration(new BufferSource(bytes))).rejects.toMatchObject({
			kind: 'TruncatedInput',
			offset: 35,
			requested: 4,
			available: 2,
		});
	});
});

describe('final page', () => {
	test('fails when the last 64 KiB contain no page', async () => {
		const bytes = concatBytes(buildVorbisFile().bytes, fillerBytes(70000));

		const promise = computeVorbisDuration(new BufferSource(bytes));
		await expect(promise).rejects.toThrow(NoOggPageFoundError);
		await expect(promise).rejects.toMatchObject({ kind: 'NoOggPageFound', searchedBytes: 65536 });
	});

	test('the tail window size can be configured', async () => {
		const { bytes } = buildVorbisFile();
		const padded = concatBytes(bytes, fillerBytes(200));

		await expect(computeVorbisDuration(new BufferSource(padded), { tailSearchSize: 100 })).rejects.toMatchObject({
			kind: 'NoOggPageFound',
			searchedBytes: 100,
		});
		expect(await computeVorbisDuration(new BufferSource(padded), { tailSearchSize: 8192 })).toBe(50);
	});

	test('a capture pattern too close to the end is truncated', async () => {
		const { bytes } = buildVorbisFile();
		const damaged = concatBytes(bytes, ascii('OggS'), new Uint8Array(3));

		await expect(computeVorbisDuration(new BufferSource(damaged))).rejects.toMatchObject({
			kind: 'TruncatedInput',
			offset: bytes.length + 6,
			requested: 8,
			available: 1,
		});
	});

	test('uses the last page when trailing garbage follows it', async () => {
		const { bytes } = buildVorbisFile({ sampleRate: 44100, finalGranule: 44100n });

		expect(await computeVorbisDuration(new BufferSource(concatBytes(bytes, fillerBytes(1000))))).toBe(1);
	});
});

describe('sources', () => {
	test('size failures surface as SourceIoError', async () => {
		const cause = new Error('disk gone');
		const source = new StreamSource({
			getSize: () => {
				throw cause;
			},
			read: () => new Uint8Array(0),
		});

		const promise = computeVorbisDuration(source);
		await expect(promise).rejects.toThrow(SourceIoError);
		await expect(promise).rejects.toMatchObject({ kind: 'SourceIoError', cause });
	});

	test('read failures surface as SourceIoError', async () => {
		const { bytes } = buildVorbisFile();
		const cause = new Error('read failed');
		const source = new StreamSource({
			getSize: () => bytes.length,
			read: async (start, end) => {
				if (end - start > 4) {
					throw cause;
				}

				return bytes.slice(start, end);
			},
		});

		await expect(computeVorbisDuration(source)).rejects.toMatchObject({ kind: 'SourceIoError', cause });
	});

	test('a disposed source cannot be measured', async () => {
		const source = new BufferSource(buildVorbisFile().bytes);
		await source.dispose();

		const promise = computeVorbisDuration(source);
		await expect(promise).rejects.toThrow(SourceDisposedError);
		await expect(promise).rejects.toMatchObject({ kind: 'SourceIoError' });
	});
});

describe('log sink', () => {
	test('receives one event per step', async () => {
		const file = buildVorbisFile();
		const events: DurationLogEvent[] = [];

		await computeVorbisDuration(new BufferSource(file.bytes), { log: event => events.push(event) });

		expect(file.bytes.length).toBe(12280);
		expect(file.finalPageOffset).toBe(8237);
		expect(events).toEqual([
			{ type: 'signature', ok: true },
			{ type: 'identification-header', offset: 28, channelCount: 2, sampleRate: 44100 },
			{ type: 'file-size', size: 12280 },
			{
				type: 'final-page',
				offset: 8237,
				granulePosition: 2_205_000n,
				serialNumber: 0x1234,
				sequenceNumber: 5,
			},
			{ type: 'duration', seconds: 50 },
		]);
	});

	test('stops after the failing step', async () => {
		const events: DurationLogEvent[] = [];
		const bytes = concatBytes(ascii('RIFF'), new Uint8Array(100));

		await expect(computeVorbisDuration(new BufferSource(bytes), { log: event => events.push(event) }))
			.rejects.toThrow(NotAnOggStreamError);
		expect(events).toEqual([{ type: 'signature', ok: false }]);
	});
});

describe('options', () => {
	test('invalid options are rejected up front', () => {
		expect(() => new VorbisDurationReader({ headerSearchSize: 0 })).toThrow(TypeError);
		expect(() => new VorbisDurationReader({ tailSearchSize: 1.5 })).toThrow(TypeError);
		expect(() => new VorbisDurationReader({ minSampleRate: 48000, maxSampleRate: 44100 })).toThrow(TypeError);
		expect(() => new VorbisDurationReader({ maxSampleRate: 1000 })).toThrow(TypeError);
	});
});
