export const CONFIG_NAMESPACE = 'dispatch';

// Connection defaults
export const DEFAULT_SMTP_PORT = 587;
export const DEFAULT_SMTPS_PORT = 465;
export const DEFAULT_SMTP_TIMEOUT_MS = 30_000;

// Retry defaults
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BACKOFF_MS = 1_000;
export const DEFAULT_BACKOFF_FACTOR = 2.0;

// DKIM
export const DEFAULT_DKIM_CANONICALIZATION = 'relaxed/relaxed';

// Attachments whose type cannot be inferred from the extension
export const DEFAULT_ATTACHMENT_CONTENT_TYPE = 'application/octet-stream';
