import { type LevelWithSilent, type Logger, pino } from "pino";

export type { LevelWithSilent, Logger };

export const LOG_LEVELS = [
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
	"silent",
] as const satisfies readonly LevelWithSilent[];

export function createLogger(level: LevelWithSilent = "info"): Logger {
	return pino({ name: "tds-client", level });
}
