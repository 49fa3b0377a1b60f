export { OutlineProcessor } from './outline-processor';
export type {
  LayoutReader,
  OutlineProcessorOptions,
} from './outline-processor';
export { OutlineExtractor } from './extractors/outline-extractor';
export { OutlineExtractError } from './extractors/outline-extract-error';
export type { ExtractOptions, HeadingCandidate } from './types';
export {
  HEADING_RULES,
  HeadingClassifier,
} from './classifiers/heading-classifier';
export type { ClassifierInput } from './classifiers/heading-classifier';
export { LevelAssigner } from './assigners/level-assigner';
export { PageCurator } from './curators/page-curator';
export { StyleProfiler } from './profilers/style-profiler';
export { TitleFragmentMerger } from './resolvers/title-fragment-merger';
export { TitleResolver } from './resolvers/title-resolver';
export { OverrideTable, passesGate } from './overrides/override-table';
export type { LineStyle } from './overrides/override-table';
export {
  HeadingOverrideSchema,
  OverrideGateSchema,
  SettingsError,
  SettingsLoader,
  SettingsSchema,
} from './config';
export type {
  ExtractorSettings,
  HeadingOverride,
  HeadingThresholds,
  OverrideGate,
  PageOffsetRule,
  Settings,
  SettingsInput,
} from './config';
