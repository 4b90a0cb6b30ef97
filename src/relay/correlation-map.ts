/**
 * CorrelationMap — which local session is waiting for which response.
 *
 * At most one live entry per ClientMsgId: registering an id again moves it
 * to the new owner. Entries leave when their response is routed or when the
 * owning session closes.
 */

import type { ClientMsgId, SessionId } from "../shared/identifiers.js";

export class CorrelationMap {
	private readonly owners = new Map<ClientMsgId, SessionId>();

	get size(): number {
		return this.owners.size;
	}

	/** Returns the previous owner when the id was already pending. */
	register(id: ClientMsgId, owner: SessionId): SessionId | undefined {
		const previous = this.owners.get(id);
		this.owners.set(id, owner);
		return previous === owner ? undefined : previous;
	}

	/** Removes the entry and returns its owner. */
	resolve(id: ClientMsgId): SessionId | undefined {
		const owner = this.owners.get(id);
		if (owner !== undefined) this.owners.delete(id);
		return owner;
	}

	ownerOf(id: ClientMsgId): SessionId | undefined {
		return this.owners.get(id);
	}

	/** Removes the entry only if `owner` still holds it. */
	releaseIfOwner(id: ClientMsgId, owner: SessionId): boolean {
		if (this.owners.get(id) !== owner) return false;
		this.owners.delete(id);
		return true;
	}

	/** Drops every entry held by `owner` and returns how many there were. */
	purge(owner: SessionId): number {
		let removed = 0;
		for (const [id, holder] of this.owners) {
			if (holder === owner) {
				this.owners.delete(id);
				removed += 1;
			}
		}
		return removed;
	}
}
