import { err, ok, type Result } from 'neverthrow';

import { InvalidUrlError } from './errors.js';
import type { RequestProcessor } from './types.js';

export const TYPICAL_ENVIRONMENTS = ['local', 'development', 'staging', 'production'] as const;

export type TypicalEnvironment = (typeof TYPICAL_ENVIRONMENTS)[number];

/**
 * A named set of base URLs, one per deployment environment, plus an
 * optional last-step rewrite applied to every assembled request.
 */
export interface ServerDefinition<TEnv extends string = TypicalEnvironment> {
  readonly name: string;
  readonly baseUrls: Readonly<Partial<Record<TEnv, string>>>;
  readonly defaultEnvironment: TEnv;
  readonly requestProcessor?: RequestProcessor | undefined;
}

/**
 * What the assembler needs from the selected environment.
 */
export interface Environment {
  readonly name: string;
  readonly baseUrl: string;
  readonly requestProcessor: RequestProcessor;
}

const identity: RequestProcessor = (request) => request;

export function defineServer<TEnv extends string = TypicalEnvironment>(
  server: ServerDefinition<TEnv>
): ServerDefinition<TEnv> {
  return Object.freeze({ ...server, baseUrls: Object.freeze({ ...server.baseUrls }) });
}

/**
 * A server reachable at the same URL in every typical environment.
 */
export function genericServer(
  baseUrl: string,
  requestProcessor?: RequestProcessor
): ServerDefinition<TypicalEnvironment> {
  return defineServer<TypicalEnvironment>({
    baseUrls: Object.fromEntries(TYPICAL_ENVIRONMENTS.map((environment) => [environment, baseUrl])),
    defaultEnvironment: 'production',
    name: baseUrl,
    requestProcessor,
  });
}

export function isEnvironmentOf<TEnv extends string>(server: ServerDefinition<TEnv>, name: string): name is TEnv {
  return Object.prototype.hasOwnProperty.call(server.baseUrls, name);
}

/**
 * Select the environment to talk to. Falls back to the server's default when
 * none is given; fails when the chosen environment has no base URL.
 */
export function resolveEnvironment<TEnv extends string>(
  server: ServerDefinition<TEnv>,
  environment?: string
): Result<Environment, InvalidUrlError> {
  const name = environment ?? server.defaultEnvironment;
  const baseUrl = isEnvironmentOf(server, name) ? server.baseUrls[name] : undefined;

  if (baseUrl === undefined) {
    return err(
      new InvalidUrlError('', undefined, {
        cause: new Error(`Server "${server.name}" has no base URL for environment "${name}"`),
      })
    );
  }

  return ok({ baseUrl, name, requestProcessor: server.requestProcessor ?? identity });
}
