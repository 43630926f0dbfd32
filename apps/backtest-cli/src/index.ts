import path from "node:path";
import process from "node:process";
import { runBacktest } from "@tickloop/backtest-core";
import {
	createLogger,
	getWorkspaceRoot,
	loadBacktestConfig,
	loadEnvConfig,
	setLogLevel,
} from "@tickloop/core";
import { loadCsvDirectory } from "@tickloop/data";
import { formatSummaryStats } from "@tickloop/metrics";
import {
	buildConfigOverrides,
	isFlagSet,
	parseCliArgs,
	readLogLevelArg,
	readStringArg,
} from "./cliArgs";
import { persistBacktestResult } from "./persistResult";

const cliLogger = createLogger("backtest-cli");

const USAGE = `Usage:
  npm run backtest -- [options]

Options (all optional; profile values are used when omitted):
  --profile <name>          Backtest profile under config/backtest (default: BACKTEST_PROFILE or "default")
  --symbols <a,b,...>       Comma separated instrument list
  --start <iso>             First bar to replay
  --end <iso>               Last bar to replay
  --initialCapital <num>    Starting cash
  --frequency <num>         Return periods per year for Sharpe
  --smoothingWindow <num>   Ticks each order is spread over
  --strategy <id>           Strategy id (moving_average_cross, scripted)
  --params <json>           Strategy params as a JSON object
  --dataDir <path>          Directory holding <SYMBOL>.csv files
  --outputDir <path>        Where result files are written
  --envPath <path>          Custom .env path
  --configDir <path>        Custom config directory
  --logLevel <level>        debug, info, warn or error (default: LOG_LEVEL or "info")
  --json                    Print the full result payload
  --help                    Show this message
`;

const main = (): void => {
	const argMap = parseCliArgs(process.argv.slice(2));
	if (isFlagSet(argMap, "help")) {
		console.log(USAGE);
		return;
	}
	const logLevel = readLogLevelArg(argMap);
	if (logLevel) {
		setLogLevel(logLevel);
	}

	const envPath = readStringArg(argMap, "envPath");
	const env = loadEnvConfig(envPath);
	const config = loadBacktestConfig({
		envPath,
		configDir: readStringArg(argMap, "configDir"),
		profile: readStringArg(argMap, "profile"),
		overrides: buildConfigOverrides(argMap),
	});

	const root = getWorkspaceRoot();
	const dataDir = path.resolve(root, config.dataDir ?? "data");
	const outputDir = path.resolve(
		root,
		readStringArg(argMap, "outputDir") ?? env.outputDir ?? path.join("output", "backtests")
	);

	const series = loadCsvDirectory(dataDir, config.symbols);
	const result = runBacktest({ config, series });
	const stats = formatSummaryStats(result.performance.summary);

	cliLogger.info("backtest_summary", {
		status: result.status,
		stats,
		ticks: result.stats.ticks,
		fills: result.stats.fills,
	});
	if (isFlagSet(argMap, "json")) {
		console.log(JSON.stringify(result, null, 2));
	}

	const files = persistBacktestResult(result, config, outputDir);
	cliLogger.info("backtest_saved", {
		json: path.relative(process.cwd(), files.jsonPath) || files.jsonPath,
		csv: path.relative(process.cwd(), files.csvPath) || files.csvPath,
	});

	if (result.status === "aborted") {
		process.exitCode = 1;
	}
};

try {
	main();
} catch (error) {
	cliLogger.error("backtest_cli_failed", { error });
	process.exitCode = 1;
}
