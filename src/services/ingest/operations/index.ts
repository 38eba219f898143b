export { validateInput } from './validate-input';
export { saveDocuments } from './save-documents';
export { extractBatch } from './extract-batch';
export { saveResults } from './save-results';
