export { ReconError, type ReconErrorCode, type ReconErrorDetails } from './recon-error.js';
