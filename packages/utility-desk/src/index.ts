/**
 * utility-desk - headless view-models for municipal utility enterprises
 *
 * @packageDocumentation
 */

export * from "./types";

export {
  inMemoryEnterpriseRepository,
  inMemoryMunicipalAccountRepository,
  type EnterpriseRepository,
  type InMemoryEnterpriseRepository,
  type InMemoryRepositoryOptions,
  type MunicipalAccountRepository,
  type ReadHook,
} from "./data/repositories";
export { createSampleEnterprises } from "./data/sampleData";

export {
  createDeskLogger,
  envKeys,
  loadConfig,
  type UtilityDeskConfig,
} from "./config/loadConfig";

export {
  enterpriseViewModel,
  enterpriseLoadSteps,
  type EnterpriseViewModel,
  type EnterpriseViewModelOptions,
  type EnterpriseViewState,
  type LoadOutcome,
  type LoadTrigger,
} from "./viewModels/enterpriseViewModel";

export {
  municipalAccountViewModel,
  type AccountViewState,
  type MunicipalAccountViewModel,
  type MunicipalAccountViewModelOptions,
} from "./viewModels/municipalAccountViewModel";
