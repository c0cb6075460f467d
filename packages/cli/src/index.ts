// @alertline/cli - Public API

export { VERSION } from './version.js';
export { createConfigCommand, createDetectCommand, createSendCommand } from './commands/index.js';
export { displayValue } from './commands/config.js';
export { parseJsonOption } from './commands/detect.js';
export { formatResult, DEFAULT_TEST_MESSAGE } from './commands/send.js';
