export * from './types'
export { CommandRegistry, defaultCommands } from './CommandRegistry'
export type { RegistryRouting } from './CommandRegistry'
export { AuditCommand } from './AuditCommand'
export { DiffCommand } from './DiffCommand'
export { VersionCommand } from './VersionCommand'
export { HelpCommand } from './HelpCommand'
