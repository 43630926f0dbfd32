import fs from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { createLogger } from "@tickloop/core";
import type { RawBar } from "./bars";

const csvLogger = createLogger("data:csv");

/**
 * Accepted header names per field. The first alias is the layout written by
 * the daily price export (`price_date,ticker,open_price,...,adj_factor`).
 */
const COLUMN_ALIASES = {
	timestamp: ["price_date", "timestamp", "date", "datetime"],
	open: ["open_price", "open"],
	high: ["high_price", "high"],
	low: ["low_price", "low"],
	close: ["close_price", "close"],
	volume: ["volume"],
	adjFactor: ["adj_factor", "adjFactor"],
} as const;

type CsvField = keyof typeof COLUMN_ALIASES;

const isRow = (value: unknown): value is Record<string, string> =>
	typeof value === "object" &&
	value !== null &&
	Object.values(value).every((cell) => typeof cell === "string");

const pickCell = (
	row: Record<string, string>,
	field: CsvField
): string | undefined => {
	for (const alias of COLUMN_ALIASES[field]) {
		const value = row[alias];
		if (value !== undefined && value !== "") {
			return value;
		}
	}
	return undefined;
};

const parseTimestamp = (value: string, location: string): number => {
	const numeric = Number(value);
	if (/^\d+$/.test(value) && Number.isFinite(numeric)) {
		return numeric;
	}
	const ts = Date.parse(value);
	if (Number.isNaN(ts)) {
		throw new Error(`Invalid timestamp "${value}" at ${location}`);
	}
	return ts;
};

const parseNumber = (
	value: string | undefined,
	field: CsvField,
	location: string
): number => {
	const num = Number(value);
	if (value === undefined || !Number.isFinite(num)) {
		throw new Error(`Invalid ${field} "${value ?? ""}" at ${location}`);
	}
	return num;
};

export const parseBarsCsv = (content: string, source = "csv"): RawBar[] => {
	const records: unknown = parse(content, {
		columns: true,
		skip_empty_lines: true,
		trim: true,
	});
	if (!Array.isArray(records)) {
		throw new Error(`Unexpected CSV structure in ${source}`);
	}

	return records.map((record: unknown, index) => {
		const location = `${source}:${index + 2}`;
		if (!isRow(record)) {
			throw new Error(`Unexpected CSV row at ${location}`);
		}
		const timestamp = pickCell(record, "timestamp");
		if (timestamp === undefined) {
			throw new Error(`Missing date column at ${location}`);
		}
		const adjFactor = pickCell(record, "adjFactor");
		return {
			timestamp: parseTimestamp(timestamp, location),
			open: parseNumber(pickCell(record, "open"), "open", location),
			high: parseNumber(pickCell(record, "high"), "high", location),
			low: parseNumber(pickCell(record, "low"), "low", location),
			close: parseNumber(pickCell(record, "close"), "close", location),
			volume: parseNumber(pickCell(record, "volume"), "volume", location),
			adjFactor:
				adjFactor === undefined
					? undefined
					: parseNumber(adjFactor, "adjFactor", location),
		};
	});
};

export const loadBarsFromCsv = (filePath: string): RawBar[] => {
	const content = fs.readFileSync(filePath, "utf-8");
	return parseBarsCsv(content, path.basename(filePath));
};

/**
 * Reads `<symbol>.csv` for every requested symbol from one directory.
 */
export const loadCsvDirectory = (
	dir: string,
	symbols: readonly string[]
): Map<string, RawBar[]> => {
	const series = new Map<string, RawBar[]>();
	for (const symbol of symbols) {
		const filePath = path.join(dir, `${symbol}.csv`);
		if (!fs.existsSync(filePath)) {
			throw new Error(`No CSV file for ${symbol} at ${filePath}`);
		}
		const bars = loadBarsFromCsv(filePath);
		csvLogger.info("csv_loaded", { symbol, filePath, bars: bars.length });
		series.set(symbol, bars);
	}
	return series;
};
