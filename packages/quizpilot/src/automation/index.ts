export type {
  PageAutomation,
  AutomationType,
  Affordance,
  AffordanceRole,
  PageSnapshot,
  ActionPayload,
  ActionResult,
} from './types.js';
export { PlaywrightPageAutomation, type PlaywrightAutomationConfig } from './playwright.js';
export {
  ScriptedPageAutomation,
  type ScriptedAutomationConfig,
  type ScriptedPage,
  type ScriptedQuestion,
  type ScriptedQuestionState,
} from './scripted.js';

import { PlaywrightPageAutomation, type PlaywrightAutomationConfig } from './playwright.js';
import { ScriptedPageAutomation, type ScriptedAutomationConfig } from './scripted.js';
import type { PageAutomation } from './types.js';

export type AutomationConfig =
  | ({ type: 'playwright' } & PlaywrightAutomationConfig)
  | ({ type: 'scripted' } & ScriptedAutomationConfig);

export function createAutomation(config: AutomationConfig): PageAutomation {
  switch (config.type) {
    case 'playwright':
      return new PlaywrightPageAutomation(config);
    case 'scripted':
      return new ScriptedPageAutomation(config);
  }
}
