export { scanProject, walkForPattern, parseSearchOutput, ripgrep } from './search.js';
export type { SearchMatch, SearchOutcome, SearchTool, ScanResult } from './search.js';
export { listProjectRegions, toggleProjectRegions } from './toggle.js';
export type {
  ProjectScanOptions,
  ProjectToggleOptions,
  ProjectToggleReport,
  ProjectListReport,
  ProjectRegion,
  FileToggle,
} from './toggle.js';
export { bufferFromText, loadTextFile, renderTextFile, saveTextFile } from './files.js';
export type { TextFile } from './files.js';
