export { SettingsError } from './settings-error';
export { SettingsLoader } from './settings-loader';
export type {
  ExtractorSettings,
  HeadingOverride,
  PageOffsetRule,
} from './settings-loader';
export {
  HeadingOverrideSchema,
  OverrideGateSchema,
  SettingsSchema,
} from './settings-schema';
export type {
  HeadingThresholds,
  OverrideGate,
  Settings,
  SettingsInput,
} from './settings-schema';
