import { ConfigError, isLogLevel, isRecord, type LogLevel } from "@tickloop/core";

export type ArgValue = string | boolean;
export type ArgMap = Record<string, ArgValue>;

export const parseCliArgs = (argv: string[]): ArgMap => {
	const args: ArgMap = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			args[key] = value;
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	if (positionals[0] && args.start === undefined) {
		args.start = positionals[0];
	}
	if (positionals[1] && args.end === undefined) {
		args.end = positionals[1];
	}
	return args;
};

export const readStringArg = (args: ArgMap, key: string): string | undefined => {
	const value = args[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string") {
		throw new ConfigError(`--${key} requires a value`);
	}
	return value;
};

export const readLogLevelArg = (args: ArgMap): LogLevel | undefined => {
	const value = readStringArg(args, "logLevel");
	if (value === undefined) {
		return undefined;
	}
	const level = value.toLowerCase();
	if (!isLogLevel(level)) {
		throw new ConfigError(
			`--logLevel must be one of debug, info, warn, error, got ${value}`
		);
	}
	return level;
};

export const isFlagSet = (args: ArgMap, key: string): boolean =>
	args[key] === true || args[key] === "true";

const parseNumber = (value: string, label: string): number => {
	const num = Number(value);
	if (!Number.isFinite(num)) {
		throw new ConfigError(`Invalid numeric value for --${label}: ${value}`);
	}
	return num;
};

const NUMERIC_FLAGS = ["initialCapital", "frequency", "smoothingWindow"] as const;

/**
 * Maps CLI flags onto raw profile keys. The result is merged over the
 * profile and validated with it, so values here are only shaped, not checked.
 */
export const buildConfigOverrides = (args: ArgMap): Record<string, unknown> => {
	const overrides: Record<string, unknown> = {};

	const symbols = readStringArg(args, "symbols");
	if (symbols !== undefined) {
		overrides.symbols = symbols
			.split(",")
			.map((symbol) => symbol.trim())
			.filter((symbol) => symbol.length > 0);
	}
	for (const key of ["start", "end", "dataDir"] as const) {
		const value = readStringArg(args, key);
		if (value !== undefined) {
			overrides[key] = value;
		}
	}
	for (const key of NUMERIC_FLAGS) {
		const value = readStringArg(args, key);
		if (value !== undefined) {
			overrides[key] = parseNumber(value, key);
		}
	}

	const strategyId = readStringArg(args, "strategy");
	const params = readStringArg(args, "params");
	if (strategyId !== undefined || params !== undefined) {
		overrides.strategy = {
			...(strategyId !== undefined ? { id: strategyId } : {}),
			...(params !== undefined ? { params: parseParams(params) } : {}),
		};
	}
	return overrides;
};

const parseParams = (value: string): Record<string, unknown> => {
	let parsed: unknown;
	try {
		parsed = JSON.parse(value);
	} catch (error) {
		throw new ConfigError(
			`--params must be a JSON object: ${
				error instanceof Error ? error.message : String(error)
			}`
		);
	}
	if (!isRecord(parsed)) {
		throw new ConfigError("--params must be a JSON object");
	}
	return parsed;
};
