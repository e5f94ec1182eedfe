export { UltimateTicTacToeEnv, encodeCell } from './UltimateTicTacToeEnv';
export type {
  CellCode,
  EnvOptions,
  Observation,
  ResetOptions,
  ResetResult,
  StepInfo,
  StepResult,
} from './UltimateTicTacToeEnv';
export { SelfPlayWrapper } from './SelfPlayWrapper';
export type { SelfPlayOptions } from './SelfPlayWrapper';
