import {
	GetParameterCommand,
	GetParametersByPathCommand,
	type GetParametersByPathCommandInput,
	type SSMClient,
} from "@aws-sdk/client-ssm";
import { describeError, TransportFault } from "../core/errors.js";
import type { IDirectory, ListOptions } from "../core/IDirectory.js";
import type { DirectoryEntry } from "../core/types.js";
import type { Logger } from "../logger.js";

// GetParametersByPath rejects page sizes above this
const MAX_PAGE_SIZE = 10;

export class SsmDirectory implements IDirectory {
	constructor(
		private readonly client: SSMClient,
		private readonly logger: Logger,
	) {}

	async get(path: string): Promise<string | undefined> {
		try {
			const response = await this.client.send(
				new GetParameterCommand({ Name: path, WithDecryption: false }),
			);
			this.logger.debug({ path }, "read ssm parameter");
			return response.Parameter?.Value;
		} catch (error) {
			if (isParameterNotFound(error)) {
				this.logger.debug({ path }, "ssm parameter not found");
				return undefined;
			}
			throw new TransportFault(
				`SSM GetParameter failed for ${path}: ${describeError(error)}`,
				{ cause: error },
			);
		}
	}

	async listUnder(
		prefix: string,
		options: ListOptions = {},
	): Promise<DirectoryEntry[]> {
		const { limit } = options;
		const entries: DirectoryEntry[] = [];
		let nextToken: string | undefined;

		do {
			const input: GetParametersByPathCommandInput = {
				Path: prefix,
				Recursive: true,
				WithDecryption: false,
			};
			if (limit !== undefined) input.MaxResults = Math.min(limit, MAX_PAGE_SIZE);
			if (nextToken !== undefined) input.NextToken = nextToken;

			const response = await this.fetchPage(input);
			for (const parameter of response.Parameters ?? []) {
				if (parameter.Name === undefined || parameter.Value === undefined) {
					continue;
				}
				entries.push({ path: parameter.Name, value: parameter.Value });
				if (limit !== undefined && entries.length >= limit) {
					return entries;
				}
			}
			nextToken = response.NextToken;
		} while (nextToken);

		this.logger.debug({ prefix, count: entries.length }, "listed ssm parameters");
		return entries;
	}

	private async fetchPage(input: GetParametersByPathCommandInput) {
		try {
			return await this.client.send(new GetParametersByPathCommand(input));
		} catch (error) {
			throw new TransportFault(
				`SSM GetParametersByPath failed for ${input.Path}: ${describeError(error)}`,
				{ cause: error },
			);
		}
	}
}

// matched by name so errors from another copy of the SDK are recognised too
function isParameterNotFound(error: unknown): boolean {
	return error instanceof Error && error.name === "ParameterNotFound";
}
