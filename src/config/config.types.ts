/**
 * Configuration type definition for type-safe access
 */
export interface DispatchConfiguration {
  mailUrl?: string;
  mailFrom?: string;
  retry: {
    maxAttempts: number;
    backoffMs: number;
    backoffFactor: number;
  };
  smtp: {
    timeoutMs: number;
    clientName?: string;
  };
}
