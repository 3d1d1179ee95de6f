export type { DatasetFormat, LoadOptions } from './loader.js';
export {
  loadDatasetFromFile,
  loadDatasetFromObject,
  loadDatasetFromText,
  saveDatasetToFile,
  serializeDataset,
} from './loader.js';
export type { DatasetFile, MetricSpecRaw } from './schema.js';
export { datasetSchema, fieldMappingSchema, metricSpecSchema, recordSchema } from './schema.js';
