export { logsCommand } from './logs'
export { mergeBotCommand } from './merge-bot'
export { reposAddCommand, reposListCommand, reposRemoveCommand } from './repos'
export { statusCommand } from './status'
