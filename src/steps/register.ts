import * as cucumber from '@cucumber/cucumber';
import type { ITestCaseHookParameter } from '@cucumber/cucumber';
import type { ApiContext } from '../context/api-context';
import { StepError, describeError } from '../errors/step-errors';
import { createLogger, Logger } from '../utils/logger';
import { API_STEP_DEFINITIONS } from './definitions';
import { StepArgument, StepDefinition } from './types';

export type CucumberRegistrar = Pick<typeof cucumber, 'Before' | 'Given' | 'When' | 'Then'>;

export type RegisterOptions = {
  registrar?: CucumberRegistrar;
  logger?: Logger;
  definitions?: StepDefinition[];
};

type StepCallback = (...args: StepArgument[]) => Promise<void>;

// Cucumber checks a step function's declared parameter count against the
// phrase's arguments, so each wrapper must declare exactly `arity` parameters.
const withArity = (arity: number, invoke: (args: StepArgument[]) => Promise<void>): StepCallback => {
  switch (arity) {
    case 0:
      return () => invoke([]);
    case 1:
      return (a: StepArgument) => invoke([a]);
    case 2:
      return (a: StepArgument, b: StepArgument) => invoke([a, b]);
    case 3:
      return (a: StepArgument, b: StepArgument, c: StepArgument) => invoke([a, b, c]);
    default:
      throw new RangeError(`unsupported step arity ${arity}`);
  }
};

/**
 * Registers every API step phrase with Cucumber, plus a `Before` hook that
 * resets the context so each scenario starts from a clean state.
 */
export const registerApiSteps = (context: ApiContext, options: RegisterOptions = {}): void => {
  const registrar = options.registrar ?? cucumber;
  const logger = options.logger ?? createLogger('api-steps', context.debug);
  const definitions = options.definitions ?? API_STEP_DEFINITIONS;

  registrar.Before((testCase: ITestCaseHookParameter) => {
    logger.debug('reset before scenario "%s"', testCase.pickle.name);
    context.reset(testCase.pickle.name);
  });

  for (const definition of definitions) {
    const step = definition.pattern.source;

    const invoke = async (args: StepArgument[]): Promise<void> => {
      logger.debug('run step %s', step);
      try {
        await definition.run(context, args);
      } catch (error) {
        context.eventLogger.emitEvent({
          event: 'step-failed',
          step,
          kind: error instanceof StepError ? error.kind : 'unexpected',
          message: describeError(error),
        });
        throw error;
      }
    };

    const code = withArity(definition.arity, invoke);
    if (definition.timeout === undefined) {
      registrar[definition.keyword](definition.pattern, code);
    } else {
      registrar[definition.keyword](definition.pattern, { timeout: definition.timeout }, code);
    }
  }

  logger.debug('registered %d api steps', definitions.length);
};
