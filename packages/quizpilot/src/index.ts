export { QuizPilotApp, type QuizPilotAppOptions } from './app.js';

// Orchestration
export {
  QuizOrchestrator,
  type OrchestratorOptions,
  type RunOptions,
  type RunResult,
  type SkippedQuestion,
} from './orchestrator/QuizOrchestrator.js';
export { parseRunDirective, type RunDirective } from './orchestrator/directive.js';

// Session
export { SessionStateMachine, IllegalTransitionError } from './session/SessionStateMachine.js';
export { describeFailure, type FailureCause, type FailureKind } from './session/failure.js';
export type { SessionState, SessionStateName, TransitionEvent } from './session/types.js';

// Solving
export { SolveTool, type SolveToolOptions } from './solver/SolveTool.js';
export { parseAnswer } from './solver/answerParser.js';
export {
  ANSWER_DELIMITER,
  ANSWER_PROTOCOL_VERSION,
  REASONER_SYSTEM_PROMPT,
  buildCorrectiveMessages,
  buildSolveMessages,
  renderQuestion,
} from './solver/protocol.js';
export * from './solver/types.js';

// Agents
export { PageOperatorAgent, findBooleanOption, type PageOperatorOptions } from './agents/PageOperatorAgent.js';
export { ReasoningAgent } from './agents/ReasoningAgent.js';
export { ModelQuestionLocator, extractJsonObject, locatorResponseSchema } from './agents/questionLocator.js';
export { handledKey, toHandledQuestion } from './agents/types.js';
export type { Agent, HandledQuestion, LocatedQuestion, QuestionLocator, QuestionScope } from './agents/types.js';

// Page automation
export * from './automation/index.js';

// Models
export { createModelClient, printModelInfo } from './llm/factory.js';
export { AnthropicModelClient } from './llm/anthropic.js';
export { OpenAIModelClient } from './llm/openai.js';
export { GoogleModelClient } from './llm/google.js';
export { withTimeout, withTransportRetry, type RetryPolicy } from './llm/retry.js';
export type { ChatMessage, ChatRole, CompletionOptions, ModelClient, ModelIdentity } from './llm/types.js';

// Events, errors, logging
export { RUN_EVENT_TYPES, SOLVE_EVENT_TYPES, type RunEvent, type RunEventListener, type RunEventType, type SolveEventType } from './events/RunEventTypes.js';
export * from './errors.js';
export { Logger, getLogger, type LogLevel, type LoggerOptions } from './monitoring/logger.js';
