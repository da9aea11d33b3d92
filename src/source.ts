/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import { open, type FileHandle } from 'node:fs/promises';
import { SourceDisposedError } from './errors';
import { assert, type MaybePromise, toDataView, toUint8Array } from './misc';

export type ReadResult = {
	bytes: Uint8Array;
	view: DataView;
	/** The offset of the bytes in the file. */
	offset: number;
};

/**
 * The source base class, representing a random-access resource from which bytes can be read.
 * @group Input sources
 * @public
 */
export abstract class Source {
	/** @internal */
	abstract _getFileSize(): MaybePromise<number>;
	/**
	 * Must return bytes covering at least the range [start, end). Callers never request bytes past the end of the
	 * file.
	 * @internal
	 */
	abstract _read(start: number, end: number): MaybePromise<ReadResult>;
	/** @internal */
	abstract _dispose(): MaybePromise<void>;
	/** @internal */
	_disposed = false;

	/** @internal */
	private _sizePromise: Promise<number> | null = null;

	/**
	 * Resolves with the total size of the file in bytes. This function is memoized, meaning only the first call
	 * will retrieve the size.
	 */
	async getSize() {
		if (this._disposed) {
			throw new SourceDisposedError();
		}

		return this._sizePromise ??= (async () => {
			const size = await this._getFileSize();
			if (!Number.isInteger(size) || size < 0) {
				throw new TypeError(`Source reported an invalid size: ${size}.`);
			}

			return size;
		})();
	}

	/** Releases any resources held by this source. Subsequent reads will throw. */
	async dispose() {
		if (this._disposed) {
			return;
		}

		this._disposed = true;
		await this._dispose();
	}

	/** Called each time data is retrieved from the source. Will be called with the retrieved range (end exclusive). */
	onread: ((start: number, end: number) => unknown) | null = null;
}

/**
 * A source backed by an ArrayBuffer or ArrayBufferView, with the entire file held in memory.
 * @group Input sources
 * @public
 */
export class BufferSource extends Source {
	/** @internal */
	_bytes: Uint8Array;
	/** @internal */
	_view: DataView;
	/** @internal */
	_onreadCalled = false;

	/** Creates a new {@link BufferSource} backed by the specified `ArrayBuffer` or `ArrayBufferView`. */
	constructor(buffer: ArrayBuffer | ArrayBufferView) {
		if (!(buffer instanceof ArrayBuffer) && !ArrayBuffer.isView(buffer)) {
			throw new TypeError('buffer must be an ArrayBuffer or ArrayBufferView.');
		}

		super();

		this._bytes = toUint8Array(buffer);
		this._view = toDataView(buffer);
	}

	/** @internal */
	_getFileSize(): number {
		return this._bytes.byteLength;
	}

	/** @internal */
	_read(): ReadResult {
		if (this._disposed) {
			throw new SourceDisposedError();
		}

		if (!this._onreadCalled) {
			// We just say the first read retrieves all bytes from the source (which, I mean, it does)
			this.onread?.(0, this._bytes.byteLength);
			this._onreadCalled = true;
		}

		return {
			bytes: this._bytes,
			view: this._view,
			offset: 0,
		};
	}

	/** @internal */
	_dispose() {}
}

/**
 * A source backed by a path to a file on disk. The file is opened lazily on first access.
 *
 * Make sure to call `.dispose()` when done to free the internal file handle acquired by this source.
 * @group Input sources
 * @public
 */
export class FilePathSource extends Source {
	/** @internal */
	_filePath: string;
	/** @internal */
	_fileHandle: FileHandle | null = null;
	/** @internal */
	_openPromise: Promise<FileHandle> | null = null;

	/** Creates a new {@link FilePathSource} backed by the file at the specified file path. */
	constructor(filePath: string) {
		if (typeof filePath !== 'string') {
			throw new TypeError('filePath must be a string.');
		}

		super();

		this._filePath = filePath;
	}

	get filePath() {
		return this._filePath;
	}

	/** @internal */
	private _getHandle() {
		return this._openPromise ??= (async () => {
			const handle = await open(this._filePath, 'r');

			if (this._disposed) {
				// Disposed while opening
				await handle.close();
				throw new SourceDisposedError();
			}

			this._fileHandle = handle;
			return handle;
		})();
	}

	/** @internal */
	async _getFileSize() {
		const handle = await this._getHandle();
		const stats = await handle.stat();

		return stats.size;
	}

	/** @internal */
	async _read(start: number, end: number): Promise<ReadResult> {
		if (this._disposed) {
			throw new SourceDisposedError();
		}

		const handle = await this._getHandle();

		const buffer = new Uint8Array(end - start);
		const { bytesRead } = await handle.read(buffer, 0, end - start, start);
		if (bytesRead !== end - start) {
			throw new Error(
				`Short read from '${this._filePath}': requested ${end - start} bytes at ${start}, got ${bytesRead}.`,
			);
		}

		this.onread?.(start, end);

		return {
			bytes: buffer,
			view: toDataView(buffer),
			offset: start,
		};
	}

	/** @internal */
	async _dispose() {
		const handle = this._fileHandle;
		this._fileHandle = null;

		await handle?.close();
	}
}

/**
 * Options for defining a {@link StreamSource}.
 * @group Input sources
 * @public
 */
export type StreamSourceOptions = {
	/**
	 * Called when the size of the entire file is requested. Must return or resolve to the size in bytes. This function
	 * is guaranteed to be called before `read`.
	 */
	getSize: () => MaybePromise<number>;

	/** Called when data is requested. Must return or resolve to the bytes from the specified byte range. */
	read: (start: number, end: number) => MaybePromise<Uint8Array>;

	/** Called when the source is disposed. */
	dispose?: () => unknown;
};

/**
 * A general-purpose, callback-driven source that can get its data from anywhere, as long as it allows random access.
 * @group Input sources
 * @public
 */
export class StreamSource extends Source {
	/** @internal */
	_options: StreamSourceOptions;
	/** @internal */
	_sizeRetrieved = false;

	/** Creates a new {@link StreamSource} whose behavior is specified by `options`.  */
	constructor(options: StreamSourceOptions) {
		if (!options || typeof options !== 'object') {
			throw new TypeError('options must be an object.');
		}
		if (typeof options.getSize !== 'function') {
			throw new TypeError('options.getSize must be a function.');
		}
		if (typeof options.read !== 'function') {
			throw new TypeError('options.read must be a function.');
		}
		if (options.dispose !== undefined && typeof options.dispose !== 'function') {
			throw new TypeError('options.dispose, when provided, must be a function.');
		}

		super();

		this._options = options;
	}

	/** @internal */
	async _getFileSize() {
		const size = await this._options.getSize();
		if (!Number.isInteger(size) || size < 0) {
			throw new TypeError('options.getSize must return or resolve to a non-negative integer.');
		}

		this._sizeRetrieved = true;
		return size;
	}

	/** @internal */
	async _read(start: number, end: number): Promise<ReadResult> {
		if (this._disposed) {
			throw new SourceDisposedError();
		}
		assert(this._sizeRetrieved);

		const data = await this._options.read(start, end);
		if (!(data instanceof Uint8Array)) {
			throw new TypeError('options.read must return or resolve to a Uint8Array.');
		}

		if (data.length !== end - start) {
			// Yes, we're that strict
			throw new Error(
				`options.read returned a Uint8Array with unexpected length: Requested ${
					end - start
				} bytes, but got ${data.length}.`,
			);
		}

		const bytes = toUint8Array(data); // Normalize things like Node.js Buffer to Uint8Array
		this.onread?.(start, end);

		return {
			bytes,
			view: toDataView(bytes),
			offset: start,
		};
	}

	/** @internal */
	async _dispose() {
		await this._options.dispose?.();
	}
}
