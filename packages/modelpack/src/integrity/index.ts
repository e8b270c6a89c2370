export { hashFile, verifyFile, isValidFile } from './verifier.js';
export type { FileHashResult, VerifyOptions } from './verifier.js';
