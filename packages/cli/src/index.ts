/**
 * @densemat/cli - interactive menu over the dense matrix toolbox
 */

export { emptySession, withCurrent, type MatrixSession } from './session';
export { consoleOutput, type Output } from './output';
export { SEED_ENV_VAR, createSeedSequence, loadConfig, type CliConfig } from './config';
export {
  ReadlinePrompter,
  askChoice,
  askCount,
  askNumber,
  askPath,
  type Prompter,
} from './prompt';
export {
  readManualMatrix,
  readMatrixFile,
  readOperand,
  readRandomMatrix,
  reportError,
  type CliContext,
} from './operands';
export { EXIT_KEY, MENU, MENU_TITLE, menuLines, runMenu, type MenuAction, type MenuEntry } from './menu';
