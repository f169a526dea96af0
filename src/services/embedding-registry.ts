/**
 * EmbeddingRegistry Service
 *
 * Owns the identity → vector mapping. Vectors live under `vector/<identity>`
 * keys of one store namespace, next to a `manifest` entry holding the shared
 * dimension and a version counter. Every mutation reads the manifest and
 * writes its vectors and the new manifest in one atomic store update, so
 * concurrent writers never share a version or mix dimensions. Every mutation
 * is persisted before the returned promise resolves.
 */

import type { KeyValueStore, StoreOperation, StoreReader, StoredValue } from './storage/KeyValueStore.js';
import type { FaceEncoder } from './face-encoder.js';
import { encodeFirstFace } from './face-encoder.js';
import type { EmbeddingVector, FaceSample, Identity } from '../models/face.js';
import { checkIdentity } from '../models/face.js';
import type { RegistrySnapshot } from '../models/match-result.js';
import {
	RegistryManifestSchema,
	StoredEmbeddingSchema,
	type RegistryManifest,
	type StoredEmbedding,
} from '../models/registry-manifest.js';
import {
	BackingStoreError,
	DimensionMismatchError,
	EmptyResultError,
	InputError,
	InvalidIdentityError,
	NotFoundError,
} from '../lib/errors/AttendanceErrors.js';
import { copyVector, isFiniteVector } from '../lib/embedding-utils.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';

const VECTOR_PREFIX = 'vector/';
const MANIFEST_KEY = 'manifest';

export function vectorKey(identity: Identity): string {
	return VECTOR_PREFIX + encodeURIComponent(identity);
}

/**
 * Repository class for the enrolled face embeddings
 */
export class EmbeddingRegistry<TImage> {
	private store: KeyValueStore;
	private encoder: FaceEncoder<TImage>;
	private logger: Logger;
	private clock: () => Date;

	constructor(
		store: KeyValueStore,
		encoder: FaceEncoder<TImage>,
		options: { logger?: Logger; clock?: () => Date } = {}
	) {
		this.store = store;
		this.encoder = encoder;
		this.logger = options.logger ?? defaultLogger;
		this.clock = options.clock ?? (() => new Date());
	}

	/**
	 * Current identity → vector mapping
	 *
	 * @throws NotFoundError if the registry was never built
	 */
	async load(): Promise<Map<Identity, EmbeddingVector>> {
		const snapshot = await this.snapshot();
		return new Map(snapshot.entries);
	}

	/**
	 * Immutable copy of the registry for building a matcher
	 *
	 * @throws NotFoundError if the registry was never built
	 */
	async snapshot(): Promise<RegistrySnapshot> {
		const manifest = await this.readManifest();
		if (!manifest) {
			throw new NotFoundError('embedding registry', 'No embedding registry has been built yet');
		}

		const entries: Array<readonly [Identity, EmbeddingVector]> = [];

		for await (const entry of this.store.scan({ prefix: VECTOR_PREFIX })) {
			const identity = decodeURIComponent(entry.key.slice(VECTOR_PREFIX.length));
			const parsed = StoredEmbeddingSchema.safeParse(entry.value);

			if (!parsed.success) {
				this.logger.warn('Skipping registry entry without a valid embedding', { identity });
				continue;
			}

			const vector = parsed.data.vector;
			if (manifest.dimension !== null && vector.length !== manifest.dimension) {
				throw new BackingStoreError(
					'load',
					new Error(
						`Stored vector for "${identity}" has dimension ${vector.length}, registry dimension is ${manifest.dimension}`
					)
				);
			}

			entries.push(Object.freeze([identity, Object.freeze(vector)] as const));
		}

		return Object.freeze({
			version: manifest.version,
			dimension: manifest.dimension,
			entries: Object.freeze(entries),
		});
	}

	/**
	 * Re-derive the whole registry from enrollment samples
	 *
	 * For each identity the first sample that yields a vector wins; samples
	 * without an encodable face are skipped.
	 *
	 * @returns Snapshot of the rebuilt registry
	 * @throws EmptyResultError if no sample produced a vector (nothing is written)
	 * @throws DimensionMismatchError if derived vectors differ in dimension
	 */
	async rebuildAll(
		samples: Iterable<FaceSample<TImage>> | AsyncIterable<FaceSample<TImage>>
	): Promise<RegistrySnapshot> {
		const derived = new Map<Identity, number[]>();
		let dimension: number | null = null;
		let samplesSeen = 0;

		for await (const sample of samples) {
			samplesSeen++;

			const checked = checkIdentity(sample.identity);
			if ('reason' in checked) {
				this.logger.warn('Skipping sample with invalid identity', {
					identity: sample.identity,
					reason: checked.reason,
				});
				continue;
			}

			const { identity } = checked;
			if (derived.has(identity)) {
				continue;
			}

			const vector = await encodeFirstFace(this.encoder, sample.image);
			if (vector === null || !isFiniteVector(vector)) {
				this.logger.warn('No encodable face in sample', { identity });
				continue;
			}

			if (dimension === null) {
				dimension = vector.length;
			} else if (vector.length !== dimension) {
				throw new DimensionMismatchError(dimension, vector.length);
			}

			derived.set(identity, copyVector(vector));
		}

		if (derived.size === 0) {
			throw new EmptyResultError(samplesSeen);
		}

		const snapshot = await this.save(derived);

		this.logger.info('Embedding registry rebuilt', {
			identities: derived.size,
			samples: samplesSeen,
		});

		return snapshot;
	}

	/**
	 * Replace the whole registry with `embeddings`
	 *
	 * An empty mapping leaves an initialized, empty registry behind.
	 *
	 * @returns Snapshot of the saved registry
	 * @throws InvalidIdentityError, InputError or DimensionMismatchError before any write
	 */
	async save(embeddings: ReadonlyMap<Identity, EmbeddingVector>): Promise<RegistrySnapshot> {
		let dimension: number | null = null;
		const validated: Array<[Identity, number[]]> = [];

		for (const [rawIdentity, vector] of embeddings) {
			const identity = this.validIdentity(rawIdentity);
			if (!isFiniteVector(vector)) {
				throw new InputError(`Embedding vector for "${identity}" must be non-empty with finite values`);
			}
			if (dimension === null) {
				dimension = vector.length;
			} else if (vector.length !== dimension) {
				throw new DimensionMismatchError(dimension, vector.length);
			}
			validated.push([identity, copyVector(vector)]);
		}

		const updatedAt = this.clock().toISOString();
		const replaced: StoreOperation[] = [{ type: 'deletePrefix', prefix: VECTOR_PREFIX }];
		for (const [identity, vector] of validated) {
			replaced.push({ type: 'put', key: vectorKey(identity), value: embeddingValue({ vector, updatedAt }) });
		}
		const savedDimension = dimension;

		await this.store.update((current) => {
			const version = (parseManifest(current)?.version ?? 0) + 1;
			return {
				operations: [...replaced, manifestOperation({ dimension: savedDimension, version, updatedAt })],
				result: version,
			};
		});

		return this.snapshot();
	}

	/**
	 * Insert or replace the vector of one identity
	 *
	 * @returns The registry version after the write
	 * @throws InvalidIdentityError, InputError or DimensionMismatchError before any write
	 */
	async upsert(rawIdentity: string, vector: EmbeddingVector): Promise<number> {
		const identity = this.validIdentity(rawIdentity);

		if (!isFiniteVector(vector)) {
			throw new InputError('Embedding vector must be non-empty with finite values');
		}

		const updatedAt = this.clock().toISOString();
		const stored = embeddingValue({ vector: copyVector(vector), updatedAt });

		const version = await this.store.update((current) => {
			const manifest = parseManifest(current);
			const expected = manifest?.dimension ?? null;
			if (expected !== null && vector.length !== expected) {
				throw new DimensionMismatchError(expected, vector.length);
			}

			const next = (manifest?.version ?? 0) + 1;
			return {
				operations: [
					{ type: 'put', key: vectorKey(identity), value: stored },
					manifestOperation({ dimension: expected ?? vector.length, version: next, updatedAt }),
				],
				result: next,
			};
		});

		this.logger.debug('Embedding upserted', { identity, version });
		return version;
	}

	/**
	 * Remove the vector of one identity
	 *
	 * @returns The registry version after the write
	 * @throws NotFoundError if the identity is not enrolled
	 */
	async remove(rawIdentity: string): Promise<number> {
		const identity = this.validIdentity(rawIdentity);
		const updatedAt = this.clock().toISOString();

		const version = await this.store.update((current) => {
			const manifest = parseManifest(current);
			const key = vectorKey(identity);
			if (!manifest || current.get(key) === undefined) {
				throw new NotFoundError('identity', `Identity "${identity}" is not enrolled`);
			}

			const next = manifest.version + 1;
			return {
				operations: [
					{ type: 'delete', key },
					manifestOperation({ dimension: manifest.dimension, version: next, updatedAt }),
				],
				result: next,
			};
		});

		this.logger.debug('Embedding removed', { identity, version });
		return version;
	}

	/**
	 * Enrolled identities in ascending order; empty for a registry never built
	 */
	async listIdentities(): Promise<Identity[]> {
		const identities: Identity[] = [];

		for await (const entry of this.store.scan({ prefix: VECTOR_PREFIX })) {
			identities.push(decodeURIComponent(entry.key.slice(VECTOR_PREFIX.length)));
		}

		return identities.sort();
	}

	/**
	 * Shared vector dimension; null for a registry never built or still empty
	 */
	async dimension(): Promise<number | null> {
		return (await this.readManifest())?.dimension ?? null;
	}

	/**
	 * Check a vector against the registry without writing anything
	 *
	 * @throws InputError or DimensionMismatchError
	 */
	async assertCompatible(vector: EmbeddingVector): Promise<void> {
		if (!isFiniteVector(vector)) {
			throw new InputError('Embedding vector must be non-empty with finite values');
		}

		const expected = await this.dimension();
		if (expected !== null && vector.length !== expected) {
			throw new DimensionMismatchError(expected, vector.length);
		}
	}

	/**
	 * Whether a registry was ever built or enrolled into
	 */
	async exists(): Promise<boolean> {
		return (await this.readManifest()) !== null;
	}

	private validIdentity(raw: string): Identity {
		const checked = checkIdentity(raw);
		if ('reason' in checked) {
			throw new InvalidIdentityError(raw, checked.reason);
		}
		return checked.identity;
	}

	private async readManifest(): Promise<RegistryManifest | null> {
		const raw = await this.store.get(MANIFEST_KEY);
		return raw === undefined ? null : checkManifest(raw);
	}
}

function parseManifest(current: StoreReader): RegistryManifest | null {
	const raw = current.get(MANIFEST_KEY);
	return raw === undefined ? null : checkManifest(raw);
}

function checkManifest(raw: StoredValue): RegistryManifest {
	const parsed = RegistryManifestSchema.safeParse(raw);
	if (!parsed.success) {
		throw new BackingStoreError('readManifest', new Error(parsed.error.message));
	}
	return parsed.data;
}

function manifestOperation(manifest: RegistryManifest): StoreOperation {
	return {
		type: 'put',
		key: MANIFEST_KEY,
		value: {
			dimension: manifest.dimension,
			version: manifest.version,
			updatedAt: manifest.updatedAt,
		},
	};
}

function embeddingValue(embedding: StoredEmbedding): StoredValue {
	return { vector: [...embedding.vector], updatedAt: embedding.updatedAt };
}
