import { describe, expect, it } from 'vitest';
import { navigationActions, settingsActions, subjectActions } from '../actions';
import { EventBusImpl } from '../event-bus';
import { loadConfig } from '../config';
import { createLogger } from '../logger';
import { Store } from '../store';
import { sampleState } from '../__tests__/fixtures';
import { createLoggingMiddleware } from './logging-middleware';

function setup(forceDebug: boolean) {
  const lines: string[] = [];
  const logger = createLogger({ logLevel: 'debug' }, { write: (line: string) => void lines.push(line) });
  const store = new Store({ bus: new EventBusImpl(), initialState: sampleState() });
  store.registerMiddleware(createLoggingMiddleware(logger, forceDebug));
  const messages = () => lines.map((line) => JSON.parse(line).msg);
  return { store, messages };
}

describe('createLoggingMiddleware', () => {
  it('stays quiet while debugging is off', () => {
    const { store, messages } = setup(false);
    store.dispatch(subjectActions.delete('subject-history'));
    expect(messages()).toEqual([]);
  });

  it('describes each action when debugging is forced on', () => {
    const { store, messages } = setup(true);
    store.dispatch(subjectActions.delete('subject-history'));
    expect(messages()).toEqual(['Delete subject: subject-history']);
  });

  it('marks actions that left the state unchanged', () => {
    const { store, messages } = setup(true);
    store.dispatch(subjectActions.delete('subject-missing'));
    expect(messages()).toEqual(['Delete subject: subject-missing', 'State unchanged']);
  });

  it('follows the debug mode flag in the state', () => {
    const { store, messages } = setup(false);
    store.dispatch(settingsActions.setDebugMode(true));
    store.dispatch(navigationActions.toSubjectsList());

    expect(messages()).toEqual(['Navigate to subjects list', 'State unchanged']);
  });

  describe('with a logger built from the environment', () => {
    function fromEnv(env: Record<string, string>) {
      const config = loadConfig(env);
      const lines: string[] = [];
      const logger = createLogger(config, { write: (line: string) => void lines.push(line) });
      const store = new Store({ bus: new EventBusImpl(), initialState: sampleState() });
      store.registerMiddleware(createLoggingMiddleware(logger, config.debug));
      const messages = () => lines.map((line) => JSON.parse(line).msg);
      return { store, messages };
    }

    it('traces actions when NOTECORE_DEBUG is set', () => {
      const { store, messages } = fromEnv({ NOTECORE_DEBUG: '1' });
      store.dispatch(subjectActions.delete('subject-history'));
      expect(messages()).toEqual(['Delete subject: subject-history']);
    });

    it('traces actions once debug mode is switched on at the default level', () => {
      const { store, messages } = fromEnv({});
      store.dispatch(subjectActions.delete('subject-history'));
      expect(messages()).toEqual([]);

      store.dispatch(settingsActions.setDebugMode(true));
      store.dispatch(subjectActions.delete('subject-math'));
      expect(messages()).toEqual(['Delete subject: subject-math']);
    });
  });
});
