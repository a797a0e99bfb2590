export { toStructured, toReadable, suggestedFilename, formatPercent } from './exporter.js';
export { saveAssessment, type SavedAssessment } from './writer.js';
