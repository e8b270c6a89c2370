export const VERSION = '0.1.0';

/** Sent with every HTTP request */
export const USER_AGENT = `modelpack/${VERSION}`;
