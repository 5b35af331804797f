import { Context, Effect, Option } from "effect";
import { ResolutionError } from "../types/errors";

/**
 * Explicit dependency container.
 *
 * A configuration is an ordered list of registrations keyed by the `key` of an
 * Effect `Context.Tag`. Constants are registered with {@link supply}, factories
 * with {@link provide}. {@link inject} resolves the outputs a caller selects and
 * yields them only when every dependency on the way could be produced.
 */

/**
 * Resolves a single dependency from the container currently being injected.
 */
export type Lookup = <I, S>(tag: Context.Tag<I, S>) => Effect.Effect<S, ResolutionError>;

/**
 * Builds the outputs of an injection from a lookup.
 */
export type Selector<A> = (lookup: Lookup) => Effect.Effect<A, ResolutionError>;

interface Registration {
  readonly key: string;
  readonly kind: "supply" | "provide";
  readonly produce: (lookup: Lookup) => Effect.Effect<Context.Context<never>, ResolutionError>;
}

export interface DependencyConfig {
  readonly registrations: readonly Registration[];
}

/**
 * The resolver capability the node builder depends on.
 */
export interface Resolver {
  readonly inject: <A>(
    config: DependencyConfig,
    select: Selector<A>,
  ) => Effect.Effect<A, ResolutionError>;
}

export const emptyConfig: DependencyConfig = { registrations: [] };

/**
 * Register a constant value for a tag.
 */
export function supply<I, S>(tag: Context.Tag<I, S>, value: S): DependencyConfig {
  return {
    registrations: [
      {
        key: tag.key,
        kind: "supply",
        produce: () => Effect.succeed(Context.make(tag, value)),
      },
    ],
  };
}

/**
 * Register a provider for a tag. The provider receives a lookup for its own
 * dependencies and runs at most once per injection. Failures and exceptions
 * thrown by the provider become `provider-failed` resolution errors.
 */
export function provide<I, S, E>(
  tag: Context.Tag<I, S>,
  make: (lookup: Lookup) => Effect.Effect<S, E>,
): DependencyConfig {
  return {
    registrations: [
      {
        key: tag.key,
        kind: "provide",
        produce: (lookup) =>
          Effect.suspend(() => make(lookup)).pipe(
            Effect.mapError((error) =>
              error instanceof ResolutionError ? error : providerFailed(tag.key, error),
            ),
            Effect.catchAllDefect((defect) => Effect.fail(providerFailed(tag.key, defect))),
            Effect.map((value) => Context.make(tag, value)),
          ),
      },
    ],
  };
}

function providerFailed(key: string, cause: unknown): ResolutionError {
  return new ResolutionError({
    dependency: key,
    reason: "provider-failed",
    path: [key],
    message: `provider for ${key} failed: ${describeCause(cause)}`,
    cause,
  });
}

/**
 * Merge configurations, preserving registration order.
 */
export function configs(...parts: readonly DependencyConfig[]): DependencyConfig {
  return { registrations: parts.flatMap((part) => part.registrations) };
}

/**
 * Keys registered in a configuration, in registration order.
 */
export function registeredKeys(config: DependencyConfig): readonly string[] {
  return config.registrations.map((registration) => registration.key);
}

/**
 * Resolve the outputs chosen by `select`.
 *
 * Fails with a `duplicate` error before running any provider when a key is
 * registered twice. Missing registrations, cycles and provider failures abort
 * the whole injection; `select` never observes a partial result.
 */
export function inject<A>(
  config: DependencyConfig,
  select: Selector<A>,
): Effect.Effect<A, ResolutionError> {
  return Effect.suspend<A, ResolutionError, never>(() => {
    const registry = new Map<string, Registration>();
    for (const registration of config.registrations) {
      const existing = registry.get(registration.key);
      if (existing) {
        return Effect.fail(
          new ResolutionError({
            dependency: registration.key,
            reason: "duplicate",
            path: [registration.key],
            message: `${registration.key} is registered more than once (${existing.kind} and ${registration.kind})`,
          }),
        );
      }
      registry.set(registration.key, registration);
    }

    let resolved: Context.Context<never> = Context.empty();
    const inFlight: string[] = [];

    const fromResolved = <I, S>(tag: Context.Tag<I, S>): Effect.Effect<S, ResolutionError> =>
      Option.match(Context.getOption(resolved, tag), {
        onNone: () =>
          Effect.fail(
            new ResolutionError({
              dependency: tag.key,
              reason: "provider-failed",
              path: [...inFlight, tag.key],
              message: `provider for ${tag.key} did not register a value`,
            }),
          ),
        onSome: (value) => Effect.succeed(value),
      });

    const lookup: Lookup = <I, S>(tag: Context.Tag<I, S>) =>
      Effect.suspend<S, ResolutionError, never>(() => {
        const cached = Context.getOption(resolved, tag);
        if (Option.isSome(cached)) {
          return Effect.succeed(cached.value);
        }

        const path = [...inFlight, tag.key];
        if (inFlight.includes(tag.key)) {
          return Effect.fail(
            new ResolutionError({
              dependency: tag.key,
              reason: "cycle",
              path,
              message: `dependency cycle: ${path.join(" -> ")}`,
            }),
          );
        }

        const registration = registry.get(tag.key);
        if (!registration) {
          return Effect.fail(
            new ResolutionError({
              dependency: tag.key,
              reason: "missing",
              path,
              message:
                inFlight.length > 0
                  ? `no provider for ${tag.key} (required by ${inFlight.join(" -> ")})`
                  : `no provider for ${tag.key}`,
            }),
          );
        }

        inFlight.push(tag.key);
        return registration.produce(lookup).pipe(
          Effect.mapError((error) =>
            error.reason === "provider-failed" && error.dependency === tag.key
              ? new ResolutionError({ ...withoutTag(error), path })
              : error,
          ),
          Effect.tap((context) =>
            Effect.sync(() => {
              resolved = Context.merge(resolved, context);
            }),
          ),
          Effect.ensuring(
            Effect.sync(() => {
              inFlight.pop();
            }),
          ),
          Effect.flatMap(() => fromResolved(tag)),
        );
      });

    return select(lookup);
  });
}

/**
 * Build a lookup over an already populated context. Test resolvers use this to
 * answer selections without running providers.
 */
export function lookupFromContext(context: Context.Context<never>): Lookup {
  return (tag) =>
    Option.match(Context.getOption(context, tag), {
      onNone: () =>
        Effect.fail(
          new ResolutionError({
            dependency: tag.key,
            reason: "missing",
            path: [tag.key],
            message: `no provider for ${tag.key}`,
          }),
        ),
      onSome: (value) => Effect.succeed(value),
    });
}

export const DefaultResolver: Resolver = { inject };

function withoutTag(error: ResolutionError) {
  const { dependency, reason, message, cause, suggestion } = error;
  return {
    dependency,
    reason,
    message,
    ...(cause !== undefined ? { cause } : {}),
    ...(suggestion !== undefined ? { suggestion } : {}),
  };
}

function describeCause(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
