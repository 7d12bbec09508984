/**
 * Pipeline context
 *
 * Everything one run needs, built once from the profile. Classifier and
 * notifiers are created on first use so that runs whose classify or notify
 * stage is already done need no credentials for them.
 */

import { LlmClassifier, type Classifier } from './classifier/index.js';
import { config, type Profile } from './config/index.js';
import { getDatabase } from './db/index.js';
import { OpenAiChatClient } from './llm/client.js';
import { createNotifiers, type Notifier, type NotifierFactoryOptions } from './notifiers/index.js';
import { ArxivSource, type Source } from './sources/index.js';
import { SqliteStageStore, type StageStateStore } from './state/stage-store.js';

export interface PipelineContext {
  profile: Profile;
  store: StageStateStore;
  source: Source;
  classifier: () => Classifier;
  notifiers: () => Notifier[];
}

export interface ContextOverrides {
  store?: StageStateStore;
  source?: Source;
  classifier?: Classifier;
  notifiers?: Notifier[];
  notifierOptions?: NotifierFactoryOptions;
}

/**
 * Effective classifier settings: LLM_MODEL and LLM_API_BASE take precedence over the profile
 */
export function resolveClassifierSettings(profile: Profile): Profile['classifier'] {
  return {
    ...profile.classifier,
    model: config.llm.model ?? profile.classifier.model,
    apiBase: config.llm.apiBase ?? profile.classifier.apiBase,
  };
}

export function createPipelineContext(profile: Profile, overrides: ContextOverrides = {}): PipelineContext {
  let classifier = overrides.classifier;
  let notifiers = overrides.notifiers;

  return {
    profile,
    store: overrides.store ?? new SqliteStageStore(getDatabase()),
    source: overrides.source ?? new ArxivSource(),
    classifier: () => {
      if (!classifier) {
        const settings = resolveClassifierSettings(profile);
        const client = new OpenAiChatClient({
          apiKey: config.llm.apiKey,
          apiBase: settings.apiBase,
          model: settings.model,
          temperature: settings.temperature,
        });
        classifier = new LlmClassifier(client, {
          interestTags: profile.subscriptions.interestTags,
          language: profile.language,
          maxAttempts: settings.maxAttempts,
        });
      }
      return classifier;
    },
    notifiers: () => {
      if (!notifiers) {
        notifiers = createNotifiers(profile.channels, overrides.notifierOptions);
      }
      return notifiers;
    },
  };
}
