import { Command, CommanderError } from 'commander'

export { Command, CommanderError }
