export type { IsoDate } from "./isoDate";
export {
  isIsoDate,
  toUtcMs,
  fromUtcMs,
  monthOf,
  monthStart,
  monthEnd,
  monthOrdinal,
  monthsBetween,
  isSameMonth,
  addMonths,
  addDays,
  daysBetween,
  enumerateMonths,
} from "./isoDate";
