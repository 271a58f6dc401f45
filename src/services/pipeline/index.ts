// =============================================================================
// PDF SCAN — Document Pipeline Services
// =============================================================================

export { validateUpload } from './validation';
export { RegexScanner, joinTextItems } from './regex-scanner';
export { runUpload, processUpload } from './processor';
