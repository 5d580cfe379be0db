import { formatTable } from './formatter.js';

export const COMMANDS: ReadonlyArray<readonly [string, string]> = [
  ['cluster', 'show cluster metadata and broker configuration'],
  ['config', 'show current configuration'],
  ['connect', 'create consumer and admin client'],
  ['disconnect', 'close consumer and admin client'],
  ['exit', 'exit the prompt'],
  ['help', 'show this help message'],
  ['load <file>', 'load kafka config from a json or yaml file'],
];

export function getCommandHelp(): string {
  return formatTable(['Command', 'Description'], COMMANDS);
}
