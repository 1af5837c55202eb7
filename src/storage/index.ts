import { ExportWriter } from './ExportWriter';
import { FileHealthStore } from './FileHealthStore';

export const healthStore = new FileHealthStore();

export const exportWriter = new ExportWriter();

export { ExportWriter } from './ExportWriter';
export type { ExportWriterOptions } from './ExportWriter';
export { FileHealthStore } from './FileHealthStore';
export type { FileHealthStoreOptions } from './FileHealthStore';
