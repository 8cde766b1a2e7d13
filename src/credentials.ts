/**
 * @module credentials
 *
 * Persisted user identifier. The client only reads it (`currentCustomer`);
 * the application owns writes, e.g. after a login.
 */

import { createStoragePersistor, createStore, type StoreLike } from "@marianmeres/store";

/** Narrow interface over wherever the user id is kept */
export interface CredentialStore {
	getUserId(): Promise<number | null>;
	setUserId(id: number): Promise<void>;
	clearUserId(): Promise<void>;
}

/** Storage type options ("local" and "session" need a browser) */
export type CredentialStorageType = "memory" | null;

export interface MemoryCredentialStoreOptions {
	/** Storage key (default: "woo-client:credentials") */
	storageKey?: string;
	/** "memory" keeps the value per storage key; null keeps it per instance (default: null) */
	storageType?: CredentialStorageType;
	initialUserId?: number | null;
}

interface CredentialState {
	userId: number | null;
}

/** Reactive store backed credential store */
export interface MemoryCredentialStore extends CredentialStore {
	subscribe: StoreLike<CredentialState>["subscribe"];
}

/**
 * Creates the default credential store.
 *
 * @example
 * ```typescript
 * const credentials = createMemoryCredentialStore();
 * await credentials.setUserId(42);
 * ```
 */
export function createMemoryCredentialStore(
	options: MemoryCredentialStoreOptions = {},
): MemoryCredentialStore {
	const initial: CredentialState = { userId: options.initialUserId ?? null };

	let store: StoreLike<CredentialState>;
	if (options.storageType) {
		const persistor = createStoragePersistor<CredentialState>(
			options.storageKey ?? "woo-client:credentials",
			options.storageType,
		);
		store = createStore<CredentialState>(persistor.get() ?? initial, {
			persist: persistor.set,
		});
	} else {
		store = createStore<CredentialState>(initial);
	}

	return {
		subscribe: store.subscribe,
		async getUserId() {
			return store.get().userId;
		},
		async setUserId(id: number) {
			store.set({ userId: id });
		},
		async clearUserId() {
			store.set({ userId: null });
		},
	};
}
