import { LambdaClient } from "@aws-sdk/client-lambda";
import { SSMClient } from "@aws-sdk/client-ssm";
import type { Config } from "../config.js";
import type { IDirectory } from "../core/IDirectory.js";
import type { IInvocationTransport } from "../core/IInvocationTransport.js";
import { HttpTransport } from "../infra/HttpTransport.js";
import { LambdaTransport } from "../infra/LambdaTransport.js";
import { SsmDirectory } from "../infra/SsmDirectory.js";
import { createLogger, type Logger } from "../logger.js";
import { DiscoveryResolver } from "./DiscoveryResolver.js";
import { InvocationGateway } from "./InvocationGateway.js";
import { TokenDispenserClient } from "./TokenDispenserClient.js";

export interface ClientOverrides {
	logger?: Logger;
	ssmClient?: SSMClient;
	lambdaClient?: LambdaClient;
	directory?: IDirectory;
	transport?: IInvocationTransport;
}

export function createTokenDispenserClient(
	config: Config,
	overrides: ClientOverrides = {},
): TokenDispenserClient {
	const logger = overrides.logger ?? createLogger(config.logLevel);

	const directory =
		overrides.directory ??
		new SsmDirectory(
			overrides.ssmClient ?? new SSMClient(awsClientConfig(config)),
			logger,
		);
	const transport =
		overrides.transport ?? createTransport(config, overrides, logger);

	const resolver = new DiscoveryResolver(directory, {
		defaultPrefix: config.discoveryPrefix,
		logger,
	});
	const gateway = new InvocationGateway(transport, logger);
	return new TokenDispenserClient(resolver, gateway, logger);
}

function createTransport(
	config: Config,
	overrides: ClientOverrides,
	logger: Logger,
): IInvocationTransport {
	if (config.transport === "http") {
		return new HttpTransport({ timeoutMs: config.httpTimeoutMs });
	}
	return new LambdaTransport(
		overrides.lambdaClient ?? new LambdaClient(awsClientConfig(config)),
		logger,
	);
}

// without a region the SDK falls back to its own provider chain
function awsClientConfig(config: Config): { region?: string } {
	return config.awsRegion ? { region: config.awsRegion } : {};
}
