export { Evaluator } from "./evaluator";
export { computeRecallAtK, computeApAtK } from "./metrics";
export {
  loadEvaluationSet,
  validateEvaluationSet,
  EvaluationSetError,
} from "./evaluationSet";
