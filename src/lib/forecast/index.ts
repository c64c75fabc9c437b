export type { Forecast, ForecastKpis } from "./createForecast";
export { createForecast, createForecastRegistry } from "./createForecast";
