export {
  EXTENSION_TABLE,
  normalizeExtension,
  extensionOf,
  lookupExtension,
  isSupportedFormat,
  determineAssetType,
  detectFileType,
  getExtensionsForType,
} from "./extensions.js";
export type { ExtensionEntry } from "./extensions.js";

export {
  DEFAULT_CATEGORY,
  MODELS_DIRECTORY,
  CATEGORY_RULES,
  CATEGORY_NAMES,
  categorize,
  categorizeByFilename,
  categorizeByDirectory,
} from "./categories.js";
export type { CategoryRule } from "./categories.js";
