/**
 * Weather Tool
 *
 * `query_weather` looks up current conditions and a short forecast for a
 * location through a WeatherProvider. The shipped provider talks to the AMap
 * weather REST API; tests substitute their own.
 */

import { z } from "zod";
import type { ToolRule } from "../agent/classifier.js";
import { ToolInputInvalidError, ToolUnavailableError, errorMessage } from "../errors.js";
import { toolLogger } from "../logger.js";
import { defineTool, formatIssues, type ToolCapability } from "./types.js";

const logger = toolLogger.child({ component: "weather" });

export const WEATHER_TOOL_NAME = "query_weather";

// ============================================================================
// Types
// ============================================================================

export interface ForecastDay {
	date: string;
	condition: string;
	high: number | null;
	low: number | null;
}

export interface WeatherReport {
	location: string;
	condition: string;
	/** Degrees Celsius */
	temperature: number | null;
	asOf: string;
	forecast: ForecastDay[];
}

export interface WeatherProvider {
	/**
	 * @throws ToolInputInvalidError when the location cannot be resolved
	 * @throws ToolUnavailableError when the service is unreachable or not configured
	 */
	lookup(location: string, signal?: AbortSignal): Promise<WeatherReport>;
}

export const WeatherInputSchema = z.object({
	location: z.string().trim().min(1, "location is required"),
});

export type WeatherInput = z.infer<typeof WeatherInputSchema>;

// ============================================================================
// AMap provider
// ============================================================================

const AmapLiveSchema = z.object({
	province: z.string().optional(),
	city: z.string(),
	weather: z.string(),
	temperature: z.string(),
	reporttime: z.string(),
});

const AmapCastSchema = z.object({
	date: z.string(),
	dayweather: z.string(),
	daytemp: z.string(),
	nighttemp: z.string(),
});

const AmapResponseSchema = z.object({
	status: z.string(),
	info: z.string().optional(),
	infocode: z.string().optional(),
	lives: z.array(AmapLiveSchema).optional(),
	forecasts: z
		.array(
			z.object({
				city: z.string(),
				reporttime: z.string().optional(),
				casts: z.array(AmapCastSchema),
			}),
		)
		.optional(),
});

type AmapResponse = z.infer<typeof AmapResponseSchema>;

export interface AmapWeatherProviderOptions {
	apiKey?: string;
	baseUrl: string;
	fetch?: typeof fetch;
}

function toNumber(value: string): number | null {
	const parsed = Number.parseFloat(value);
	return Number.isFinite(parsed) ? parsed : null;
}

export class AmapWeatherProvider implements WeatherProvider {
	private readonly fetchImpl: typeof fetch;

	constructor(private readonly options: AmapWeatherProviderOptions) {
		this.fetchImpl = options.fetch ?? fetch;
	}

	async lookup(location: string, signal?: AbortSignal): Promise<WeatherReport> {
		const [live, forecast] = await Promise.all([
			this.request(location, "base", signal),
			this.request(location, "all", signal),
		]);

		const current = live.lives?.[0];
		const casts = forecast.forecasts?.[0]?.casts ?? [];
		if (!current || !current.city) {
			throw new ToolInputInvalidError(`No weather data for "${location}"`, WEATHER_TOOL_NAME);
		}

		return {
			location: current.city,
			condition: current.weather,
			temperature: toNumber(current.temperature),
			asOf: current.reporttime,
			forecast: casts.map((cast) => ({
				date: cast.date,
				condition: cast.dayweather,
				high: toNumber(cast.daytemp),
				low: toNumber(cast.nighttemp),
			})),
		};
	}

	private async request(location: string, extensions: "base" | "all", signal?: AbortSignal): Promise<AmapResponse> {
		if (!this.options.apiKey) {
			throw new ToolUnavailableError("Weather API key is not configured (set AMAP_API_KEY)", WEATHER_TOOL_NAME);
		}

		const url = new URL("/v3/weather/weatherInfo", this.options.baseUrl);
		url.searchParams.set("key", this.options.apiKey);
		url.searchParams.set("city", location);
		url.searchParams.set("extensions", extensions);
		url.searchParams.set("output", "JSON");

		let body: unknown;
		try {
			const response = await this.fetchImpl(url, { method: "GET", signal });
			if (!response.ok) {
				throw new Error(`HTTP ${response.status} ${response.statusText}`);
			}
			body = await response.json();
		} catch (error) {
			if (signal?.aborted) {
				throw error;
			}
			throw new ToolUnavailableError(`Weather service unreachable: ${errorMessage(error)}`, WEATHER_TOOL_NAME);
		}

		const parsed = AmapResponseSchema.safeParse(body);
		if (!parsed.success) {
			throw new ToolUnavailableError(
				`Unexpected weather service response: ${formatIssues(parsed.error).join("; ")}`,
				WEATHER_TOOL_NAME,
			);
		}
		if (parsed.data.status !== "1") {
			// 10001/10003-style codes are key problems; anything else is treated as a bad location
			const code = parsed.data.infocode ?? "";
			const info = parsed.data.info ?? "unknown error";
			if (code.startsWith("1000")) {
				throw new ToolUnavailableError(`Weather service rejected the request: ${info}`, WEATHER_TOOL_NAME);
			}
			throw new ToolInputInvalidError(`Weather service could not resolve "${location}": ${info}`, WEATHER_TOOL_NAME);
		}
		return parsed.data;
	}
}

// ============================================================================
// Tool
// ============================================================================

export function createWeatherTool(provider: WeatherProvider): ToolCapability<WeatherInput, WeatherReport> {
	return defineTool({
		name: WEATHER_TOOL_NAME,
		description: "Current weather and a short forecast for a city",
		inputSchema: WeatherInputSchema,
		async run(input, context) {
			logger.debug({ location: input.location }, "Looking up weather");
			return provider.lookup(input.location, context.signal);
		},
	});
}

// ============================================================================
// Classification rule
// ============================================================================

const WEATHER_CUE = /\b(?:weather|forecast|temperature|rain(?:ing|y)?|snow(?:ing|y)?|sunny|humidity)\b|天气|气温|温度|下雨|下雪|预报/i;

/** Words that end an English location phrase */
const LOCATION_STOP_WORDS = new Set([
	"today",
	"tomorrow",
	"tonight",
	"now",
	"right",
	"currently",
	"this",
	"next",
	"the",
	"like",
	"in",
	"at",
	"for",
	"on",
	"and",
	"please",
	"according",
	"is",
	"be",
	"will",
	"with",
]);

const CJK_LOCATION = /(\p{Script=Han}{2,10}?)(?:今天|明天|后天|现在|今晚|这周|本周|未来几天)?的?(?:天气|气温|温度|会下雨|下雨|会下雪|下雪)/u;
const CJK_LEADING_VERB = /^(?:我想知道|想知道|请问|请|帮我|帮忙)?(?:查询一下|查询|查一下|查查|查|看看|看一下|告诉我|问一下)?/u;
const CJK_TIME_WORDS = ["今天", "明天", "后天", "现在", "今晚", "今日", "这周", "本周", "最近"];
const CJK_LEADING_TIME = new RegExp(`^(?:${CJK_TIME_WORDS.join("|")})+`, "u");

/**
 * Pull a location out of a weather question
 *
 * "What's the weather in New York today?" → "New York"
 * "深圳明天天气怎么样" → "深圳"
 * "今天北京天气" → "北京"
 */
export function extractLocation(message: string): string | null {
	for (const match of message.matchAll(/\b(?:in|for|at)\s+/gi)) {
		const rest = message.slice((match.index ?? 0) + match[0].length);
		const phrase = rest.match(/^[\p{L}.'-]+(?:\s+[\p{L}.'-]+){0,3}/u)?.[0] ?? "";
		const kept: string[] = [];
		for (const word of phrase.split(/\s+/)) {
			const bare = word.replace(/[.'-]+$/, "");
			if (!bare || LOCATION_STOP_WORDS.has(bare.toLowerCase())) break;
			kept.push(bare);
		}
		if (kept.length > 0) {
			return kept.join(" ");
		}
	}

	const cjk = message.match(CJK_LOCATION);
	if (cjk) {
		// A time word may come before or after the polite verb
		const candidate = cjk[1]
			.replace(CJK_LEADING_TIME, "")
			.replace(CJK_LEADING_VERB, "")
			.replace(CJK_LEADING_TIME, "");
		if (candidate) {
			return candidate;
		}
	}
	return null;
}

export const weatherToolRule: ToolRule = {
	toolName: WEATHER_TOOL_NAME,
	matches: (message) => WEATHER_CUE.test(message),
	extractArguments: (message) => {
		const location = extractLocation(message);
		return location ? { location } : null;
	},
};
