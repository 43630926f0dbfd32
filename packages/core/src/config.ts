import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { ConfigError } from "./errors";

export const DEFAULT_INITIAL_CAPITAL = 100_000;
export const DEFAULT_FREQUENCY = 252;
export const DEFAULT_SMOOTHING_WINDOW = 5;
export const DEFAULT_EXCHANGE = "SIMULATED";

export interface StrategySelection {
	id: string;
	params: Record<string, unknown>;
}

export interface BacktestConfig {
	symbols: string[];
	/** Inclusive replay window, UTC epoch ms. */
	start?: number;
	end?: number;
	initialCapital: number;
	/** Periods per year used to annualize the Sharpe ratio. */
	frequency: number;
	smoothingWindow: number;
	exchange: string;
	dataDir?: string;
	strategy: StrategySelection;
}

export interface EnvConfig {
	backtestProfile: string;
	dataDir?: string;
	outputDir?: string;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	profile?: string;
	/** Raw values merged over the profile before validation (CLI flags). */
	overrides?: Record<string, unknown>;
}

let envLoaded = false;
let loadedEnvPath: string | undefined;
let cachedWorkspaceRoot: string | undefined;

export const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const isWorkspaceRoot = (dir: string): boolean => {
	if (fs.existsSync(path.join(dir, ".git"))) {
		return true;
	}
	const manifest = path.join(dir, "package.json");
	if (!fs.existsSync(manifest)) {
		return false;
	}
	const parsed: unknown = JSON.parse(fs.readFileSync(manifest, "utf-8"));
	return isRecord(parsed) && Array.isArray(parsed.workspaces);
};

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();
	while (!isWorkspaceRoot(current)) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

export const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

export const loadEnvConfig = (
	envPath = path.join(findWorkspaceRoot(), ".env")
): EnvConfig => {
	if (!envLoaded || loadedEnvPath !== envPath) {
		dotenv.config({ path: envPath });
		envLoaded = true;
		loadedEnvPath = envPath;
	}

	return {
		backtestProfile: readOptionalEnvVar("BACKTEST_PROFILE") ?? "default",
		dataDir: readOptionalEnvVar("DATA_DIR"),
		outputDir: readOptionalEnvVar("OUTPUT_DIR"),
	};
};

const readJsonFile = (filePath: string): unknown => {
	if (!fs.existsSync(filePath)) {
		throw new ConfigError(`Config file not found: ${filePath}`);
	}
	const contents = fs.readFileSync(filePath, "utf-8");
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new ConfigError(
			`Config file ${filePath} is not valid JSON: ${
				error instanceof Error ? error.message : String(error)
			}`
		);
	}
};

const ensurePositiveNumber = (
	value: unknown,
	field: string,
	fallback?: number
): number => {
	if (value === undefined && fallback !== undefined) {
		return fallback;
	}
	if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
		throw new ConfigError(`${field} must be a positive number`);
	}
	return value;
};

const ensurePositiveInteger = (
	value: unknown,
	field: string,
	fallback: number
): number => {
	const num = ensurePositiveNumber(value, field, fallback);
	if (!Number.isInteger(num)) {
		throw new ConfigError(`${field} must be an integer`);
	}
	return num;
};

const ensureSymbols = (value: unknown): string[] => {
	if (!Array.isArray(value) || value.length === 0) {
		throw new ConfigError("symbols must be a non-empty array of strings");
	}
	const symbols: string[] = [];
	for (const entry of value) {
		if (typeof entry !== "string" || !entry.trim()) {
			throw new ConfigError("symbols must be a non-empty array of strings");
		}
		symbols.push(entry.trim());
	}
	if (new Set(symbols).size !== symbols.length) {
		throw new ConfigError("symbols must not contain duplicates");
	}
	return symbols;
};

export const parseDateInput = (
	value: unknown,
	field: string
): number | undefined => {
	if (value === undefined || value === null) {
		return undefined;
	}
	if (typeof value === "number" && Number.isFinite(value)) {
		return value;
	}
	if (typeof value === "string") {
		const ts = Date.parse(value);
		if (!Number.isNaN(ts)) {
			return ts;
		}
	}
	throw new ConfigError(`${field} must be an ISO date or epoch milliseconds`);
};

const ensureStrategy = (value: unknown): StrategySelection => {
	if (!isRecord(value) || typeof value.id !== "string" || !value.id) {
		throw new ConfigError('strategy must include an "id" property');
	}
	const params = value.params ?? {};
	if (!isRecord(params)) {
		throw new ConfigError("strategy.params must be an object");
	}
	return { id: value.id, params };
};

/**
 * Validates a raw backtest profile. Exported separately so CLI overrides can
 * be merged into the raw object before validation.
 */
export const parseBacktestConfig = (raw: unknown): BacktestConfig => {
	if (!isRecord(raw)) {
		throw new ConfigError("Backtest config must be a JSON object");
	}
	const start = parseDateInput(raw.start, "start");
	const end = parseDateInput(raw.end, "end");
	if (start !== undefined && end !== undefined && start > end) {
		throw new ConfigError("start must not be after end");
	}
	const exchange = raw.exchange ?? DEFAULT_EXCHANGE;
	if (typeof exchange !== "string") {
		throw new ConfigError("exchange must be a string");
	}
	const dataDir = raw.dataDir;
	if (dataDir !== undefined && typeof dataDir !== "string") {
		throw new ConfigError("dataDir must be a string");
	}

	return {
		symbols: ensureSymbols(raw.symbols),
		start,
		end,
		initialCapital: ensurePositiveNumber(
			raw.initialCapital,
			"initialCapital",
			DEFAULT_INITIAL_CAPITAL
		),
		frequency: ensurePositiveInteger(
			raw.frequency,
			"frequency",
			DEFAULT_FREQUENCY
		),
		smoothingWindow: ensurePositiveInteger(
			raw.smoothingWindow,
			"smoothingWindow",
			DEFAULT_SMOOTHING_WINDOW
		),
		exchange,
		dataDir,
		strategy: ensureStrategy(raw.strategy),
	};
};

export const resolveBacktestConfigPath = (
	configDir: string,
	profile: string
): string => {
	const fileName = profile.endsWith(".json") ? profile : `${profile}.json`;
	return path.join(configDir, "backtest", fileName);
};

export const readBacktestProfile = (
	configDir: string,
	profile: string
): Record<string, unknown> => {
	const configPath = resolveBacktestConfigPath(configDir, profile);
	const raw = readJsonFile(configPath);
	if (!isRecord(raw)) {
		throw new ConfigError(`Backtest config at ${configPath} must be an object`);
	}
	return raw;
};

/**
 * Shallow merge, except for `strategy`: an override naming a different
 * strategy id drops the profile's params, one without an id only swaps them.
 */
export const mergeConfigOverrides = (
	raw: Record<string, unknown>,
	overrides: Record<string, unknown> = {}
): Record<string, unknown> => {
	const merged = { ...raw, ...overrides };
	const base = raw.strategy;
	const override = overrides.strategy;
	if (isRecord(base) && isRecord(override)) {
		const switched = override.id !== undefined && override.id !== base.id;
		merged.strategy = { ...base, ...(switched ? { params: {} } : {}), ...override };
	}
	return merged;
};

export const loadBacktestConfig = (
	options: ConfigLoadOptions = {}
): BacktestConfig => {
	const env = loadEnvConfig(options.envPath);
	const configDir = options.configDir ?? getDefaultConfigDir();
	const profile = options.profile ?? env.backtestProfile;
	const raw = readBacktestProfile(configDir, profile);
	const config = parseBacktestConfig(
		mergeConfigOverrides(raw, options.overrides)
	);
	return {
		...config,
		dataDir: config.dataDir ?? env.dataDir,
	};
};
