export { terminalOutput, TerminalOutput } from './terminal';
export { jsonOutput, JSONOutput } from './json';
