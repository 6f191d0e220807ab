/**
 * Evaluation Public API
 *
 * Loads the Evaluator class, then the modules that extend its prototype.
 *
 * @internal
 */

import { Evaluator, getEvaluator } from './evaluator.js';
import './statements.js';
import './expressions.js';
import './calls.js';

export { Evaluator, getEvaluator };
