/**
 * Logger Module
 *
 * Pino-based structured logging for the agent process.
 * Provides child loggers for the ingestion, index, agent, llm, tool and store modules.
 */

import pino from "pino";

const isDev = process.env.NODE_ENV !== "production";
const isTest = process.env.VITEST !== undefined;

function resolveLevel(): string {
	if (process.env.LOG_LEVEL) {
		return process.env.LOG_LEVEL;
	}
	if (isTest) {
		return "silent";
	}
	return isDev ? "debug" : "info";
}

export const logger = pino({
	level: resolveLevel(),
	transport:
		isDev && !isTest
			? {
					target: "pino-pretty",
					options: {
						colorize: true,
						ignore: "pid,hostname",
						translateTime: "HH:MM:ss",
						destination: 2,
					},
				}
			: undefined,
});

// Child loggers for different components
export const ingestLogger = logger.child({ module: "ingest" });
export const indexLogger = logger.child({ module: "index" });
// agentLogger covers turn routing, tool dispatch and synthesis
export const agentLogger = logger.child({ module: "agent" });
export const llmLogger = logger.child({ module: "llm" });
export const toolLogger = logger.child({ module: "tool" });
export const storeLogger = logger.child({ module: "store" });
