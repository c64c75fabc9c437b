import type { CalculatorRegistry } from "@/lib/calculatorRegistry";

import { registerEmployeeCalculators } from "./employee";
import { registerExpenseCalculators } from "./expense";
import { registerRevenueCalculators } from "./revenue";

export { DEFAULT_OVERHEAD_MULTIPLIER, DEFAULT_CLIFF_YEARS } from "./employee";
export { DEFAULT_GRANT_MONTHS } from "./revenue";
export { registerEmployeeCalculators, registerRevenueCalculators, registerExpenseCalculators };

/** Register every operating-entity calculator on the given registry. */
export function registerBuiltinCalculators(registry: CalculatorRegistry): CalculatorRegistry {
  registerEmployeeCalculators(registry);
  registerRevenueCalculators(registry);
  registerExpenseCalculators(registry);
  return registry;
}
