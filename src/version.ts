/**
 * Version information for the logbook CLI
 */

// Kept in sync with package.json by hand
export const VERSION = "0.1.0";
