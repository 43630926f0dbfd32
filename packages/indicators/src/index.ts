export { mean, sma } from "./sma";
