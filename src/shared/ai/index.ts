/**
 * Shared AI Module
 *
 * Baseline agents and move policies that sit on top of the rules engine.
 *
 * @module ai
 */

export {
  // Types
  type Agent,
  type MovePolicy,
  // Values
  RandomAgent,
  randomPolicy,
} from './RandomAgent';
