// @alertline/cli - Command exports

export { createConfigCommand } from './config.js';
export { createDetectCommand } from './detect.js';
export { createSendCommand } from './send.js';
