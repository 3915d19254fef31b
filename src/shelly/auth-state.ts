// src/shelly/auth-state.ts

export type AuthState = 'enabled' | 'disabled' | 'unknown';

export type AuthStateListener = (state: AuthState, previous: AuthState) => void;

/**
 * Map a raw auth flag from the device onto AuthState.
 * Returns undefined when the value cannot be used.
 */
export function authStateFromFlag(value: unknown): AuthState | undefined {
	if (typeof value === 'boolean') {
		return value ? 'enabled' : 'disabled';
	}
	if (typeof value === 'number' && Number.isFinite(value)) {
		return value !== 0 ? 'enabled' : 'disabled';
	}
	return undefined;
}

/**
 * Last known auth state of one device. Advisory only: whoever sets it last wins.
 */
export class DeviceAuthState {
	private current: AuthState = 'unknown';
	private readonly listeners = new Set<AuthStateListener>();

	public get value(): AuthState {
		return this.current;
	}

	public set(next: AuthState): void {
		const previous = this.current;
		this.current = next;

		if (previous === next) {
			return;
		}

		for (const listener of this.listeners) {
			listener(next, previous);
		}
	}

	public onChange(listener: AuthStateListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}
}
