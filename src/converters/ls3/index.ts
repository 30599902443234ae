/**
 * LS3 Export and Import
 */

export { exportScene, parseExportConfig, Ls3Exporter } from './ls3-exporter';
export type { ExportResult, ExportedFile, ExportOptions } from './ls3-exporter';
export { importLs3, parseImportConfig, Ls3Importer } from './ls3-importer';
export type { ImportResult, ImportOptions } from './ls3-importer';
