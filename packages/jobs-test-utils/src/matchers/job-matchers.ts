import { InvalidArgsError, JobPipeline, type FieldDescriptor, type FieldType } from '@typed-jobs/core';
import type { z } from 'zod';

type ErrorClass = abstract new (...args: never[]) => Error;

export interface ToHaveArgOptions {
  default?: unknown;
}

export interface ToRejectArgsOptions {
  /** Expected error class; InvalidArgsError when omitted */
  error?: ErrorClass;
  /** Substring or pattern the error message must match */
  message?: string | RegExp;
}

export interface JobMatchers<R = unknown> {
  toHaveArg(field: string, type?: FieldType, options?: ToHaveArgOptions): R;
  toHaveArgs(fields: readonly string[]): R;
  toAcceptArgs(input: unknown): R;
  toRejectArgs(input: unknown, options?: ToRejectArgsOptions): R;
}

type MatcherResult = { pass: boolean; message: () => string };

type MatcherContext = {
  isNot: boolean;
  equals: (a: unknown, b: unknown) => boolean;
};

type InspectableJob = JobPipeline<z.ZodTypeAny | undefined, unknown>;

function notAJob(received: unknown, matcher: string): MatcherResult {
  return {
    pass: false,
    message: () => `${matcher} expects a job defined with defineJob(), got ${typeof received}`
  };
}

function isJob(received: unknown): received is InspectableJob {
  return received instanceof JobPipeline;
}

function fieldList(fields: FieldDescriptor[]): string {
  return fields.length === 0 ? '(none)' : fields.map((field) => field.name).join(', ');
}

function capture(fn: () => unknown): unknown {
  try {
    fn();
    return undefined;
  } catch (error) {
    return error;
  }
}

function matchesMessage(message: string, expected: string | RegExp): boolean {
  return typeof expected === 'string' ? message.includes(expected) : expected.test(message);
}

export const jobMatchers = {
  toHaveArg(
    this: MatcherContext,
    received: unknown,
    field: string,
    type?: FieldType,
    options?: ToHaveArgOptions
  ): MatcherResult {
    if (!isJob(received)) return notAJob(received, 'toHaveArg');

    const fields = received.fields();
    const descriptor = fields.find((candidate) => candidate.name === field);
    if (descriptor === undefined) {
      return {
        pass: false,
        message: () => `expected ${received.name} to have argument '${field}', defined: ${fieldList(fields)}`
      };
    }

    if (type !== undefined && descriptor.type !== type) {
      return {
        pass: false,
        message: () => `expected ${received.name}.${field} to be ${type}, got ${descriptor.type}`
      };
    }

    if (options !== undefined && 'default' in options) {
      if (!descriptor.hasDefault) {
        return {
          pass: false,
          message: () => `expected ${received.name}.${field} to have a default`
        };
      }
      const actual = descriptor.defaultValue();
      if (!this.equals(actual, options.default)) {
        return {
          pass: false,
          message: () =>
            `expected ${received.name}.${field} to default to ${JSON.stringify(options.default)}, got ${JSON.stringify(actual)}`
        };
      }
    }

    return {
      pass: true,
      message: () => `expected ${received.name} not to have argument '${field}'`
    };
  },

  toHaveArgs(this: MatcherContext, received: unknown, expected: readonly string[]): MatcherResult {
    if (!isJob(received)) return notAJob(received, 'toHaveArgs');

    const fields = received.fields();
    const names = new Set(fields.map((field) => field.name));
    const missing = expected.filter((name) => !names.has(name));

    return {
      pass: missing.length === 0,
      message: () =>
        this.isNot
          ? `expected ${received.name} not to have arguments ${expected.join(', ')}`
          : `expected ${received.name} to have arguments ${missing.join(', ')}, defined: ${fieldList(fields)}`
    };
  },

  toAcceptArgs(this: MatcherContext, received: unknown, input: unknown): MatcherResult {
    if (!isJob(received)) return notAJob(received, 'toAcceptArgs');

    const error = capture(() => received.buildArguments(input));
    return {
      pass: error === undefined,
      message: () =>
        error === undefined
          ? `expected ${received.name} to reject ${JSON.stringify(input)}`
          : `expected ${received.name} to accept ${JSON.stringify(input)}, but: ${error instanceof Error ? error.message : String(error)}`
    };
  },

  toRejectArgs(
    this: MatcherContext,
    received: unknown,
    input: unknown,
    options: ToRejectArgsOptions = {}
  ): MatcherResult {
    if (!isJob(received)) return notAJob(received, 'toRejectArgs');

    const expectedClass = options.error ?? InvalidArgsError;
    const error = capture(() => received.buildArguments(input));

    if (error === undefined) {
      return {
        pass: false,
        message: () => `expected ${received.name} to reject ${JSON.stringify(input)}`
      };
    }

    if (!(error instanceof expectedClass)) {
      return {
        pass: false,
        message: () =>
          `expected ${received.name} to reject with ${expectedClass.name}, got ${error instanceof Error ? error.name : String(error)}`
      };
    }

    if (options.message !== undefined && !matchesMessage(error.message, options.message)) {
      const expectedMessage = String(options.message);
      return {
        pass: false,
        message: () => `expected rejection message to match ${expectedMessage}, got: ${error.message}`
      };
    }

    return {
      pass: true,
      message: () => `expected ${received.name} to accept ${JSON.stringify(input)}, but: ${error.message}`
    };
  }
};
