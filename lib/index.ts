export {
  runSimulation,
  simulate,
  simulateMonth,
  computeLoanSetup,
  computeContractPayment,
  initialState,
  getMonthlyCashflow,
} from "./model/engine";
export type {
  LoanSetup,
  SimulationState,
  MonthlyRecord,
  SimulationTotals,
  SimulationWarning,
  SimulationResult,
} from "./model/engine";
export { InvalidInputError, assertValidParameters, getInvalidInputs } from "./model/errors";
export type { InvalidInput, InvalidInputCode } from "./model/errors";
export { validateParameters } from "./model/validation";
export type { ValidationResult, ValidationError, ValidationWarning } from "./model/validation";
export { DEFAULT_PARAMETERS, resolveParameters, clampParameters } from "./model/effective-parameters";
export { SimulationParametersSchema, SavedScenarioSchema } from "./types/zod";
export type { SimulationParameters, SavedScenario } from "./types/zod";
export { simulationToCsv, getCsvFilename } from "./export/simulation-csv";
export { getRoiPercentSeries, getReturnSeries, sampleYearEnds } from "./utils/chart-series";
export type { RoiPercentPoint, ReturnPoint } from "./utils/chart-series";
export { diffParameters } from "./utils/scenario-diff";
export type { ParameterChange } from "./utils/scenario-diff";
export { formatCurrency, formatPercent, formatRate } from "./utils/format";
export {
  parseScenarioJson,
  serializeScenario,
  loadScenarioFile,
  saveScenarioFile,
} from "./persistence/scenario-file";
