export { AlertClient } from './client';
export type { AlertClientConfig, AlertSubmission } from './client';
