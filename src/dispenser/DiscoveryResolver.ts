import { DiscoveryError } from "../core/errors.js";
import type { IDirectory } from "../core/IDirectory.js";
import {
	type BackendIdentifier,
	DEFAULT_DISCOVERY_PREFIX,
	type DirectoryEntry,
} from "../core/types.js";
import type { Logger } from "../logger.js";

export type CandidateSelection =
	| { success: true; entry: DirectoryEntry }
	| { success: false; reason: "none" | "many" };

/** Accepts exactly one candidate; never picks among several. */
export function selectSoleCandidate(
	entries: readonly DirectoryEntry[],
): CandidateSelection {
	const [first] = entries;
	if (first === undefined) {
		return { success: false, reason: "none" };
	}
	if (entries.length > 1) {
		return { success: false, reason: "many" };
	}
	return { success: true, entry: first };
}

export interface DiscoveryResolverOptions {
	defaultPrefix?: string;
	logger: Logger;
}

export class DiscoveryResolver {
	private readonly defaultPrefix: string;
	private readonly logger: Logger;

	constructor(
		private readonly directory: IDirectory,
		options: DiscoveryResolverOptions,
	) {
		this.defaultPrefix = options.defaultPrefix ?? DEFAULT_DISCOVERY_PREFIX;
		this.logger = options.logger;
	}

	/**
	 * Finds the dispenser to call. An explicit key is trusted as a full path;
	 * without one, the default prefix must hold exactly one entry.
	 */
	async resolve(discoveryKey?: string): Promise<BackendIdentifier> {
		if (discoveryKey) {
			return this.resolveExplicit(discoveryKey);
		}
		return this.resolveByPrefix(this.defaultPrefix);
	}

	private async resolveExplicit(key: string): Promise<BackendIdentifier> {
		const value = await this.directory.get(key);
		if (value === undefined) {
			throw new DiscoveryError(
				"NotFound",
				key,
				`No token dispenser identifier found at: ${key}`,
			);
		}
		this.logger.debug({ discoveryKey: key }, "resolved dispenser by key");
		return value;
	}

	private async resolveByPrefix(prefix: string): Promise<BackendIdentifier> {
		// two entries are enough to know the prefix is ambiguous
		const entries = await this.directory.listUnder(prefix, { limit: 2 });
		const selection = selectSoleCandidate(entries);

		if (selection.success) {
			this.logger.debug(
				{ prefix, discoveryKey: selection.entry.path },
				"resolved dispenser under default prefix",
			);
			return selection.entry.value;
		}

		if (selection.reason === "many") {
			throw new DiscoveryError(
				"Ambiguous",
				prefix,
				`Found more than one token dispenser identifier under: ${prefix}. ` +
					"Pass an explicit discovery key naming the deployment to use.",
			);
		}
		throw new DiscoveryError(
			"NotFound",
			prefix,
			`Found no token dispenser identifier under: ${prefix}. ` +
				"Pass an explicit discovery key naming the deployment to use.",
		);
	}
}
