export { enforceQuestionLimits, type QuestionLimits } from './questionLimits.js';
