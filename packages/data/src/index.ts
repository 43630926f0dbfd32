export { deriveBars, normalizeRawBars, type RawBar } from "./bars";
export { alignSeries, type AlignOptions, type AlignedSeries } from "./align";
export {
	InMemoryDataSource,
	type InMemoryDataSourceOptions,
	type RawSeriesInput,
} from "./InMemoryDataSource";
export { loadBarsFromCsv, loadCsvDirectory, parseBarsCsv } from "./csv";
