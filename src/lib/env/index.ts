export type { ForecastConfig } from "./forecast";
export { forecastConfig } from "./forecast";
