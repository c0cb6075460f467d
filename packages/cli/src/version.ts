// @alertline/cli - Version

export const VERSION = '0.1.0';
