export { checkCommand } from './check'
export { formatCommand } from './format'
export { infoCommand } from './info'
