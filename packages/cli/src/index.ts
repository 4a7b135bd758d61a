/**
 * @bgscreen/cli
 *
 * Command handlers behind the `bgscreen` binary.
 */

export { submitCommand } from './commands/submit';
export { statusCommand } from './commands/status';
export { downloadCommand } from './commands/download';
export { validateCommand } from './commands/validate';
export { formatCommand } from './commands/format';
export { describeDownload, describeIssues, describeStatus } from './commands/render';
