import { Duration, Effect, Schedule } from "effect";
import type { AppCreator, AppCreatorOptions, Application } from "../core/interfaces/application";

/**
 * Node application that tracks slots on a fixed interval. Block production
 * and the execution client are driven elsewhere; this keeps the process alive
 * and reports progress.
 */

export const DEFAULT_SLOT_INTERVAL = Duration.seconds(6);

export function slotPosition(slot: number, slotsPerEpoch: number): { epoch: number; index: number } {
  return { epoch: Math.floor(slot / slotsPerEpoch), index: slot % slotsPerEpoch };
}

export function createNodeApplication(
  options: AppCreatorOptions,
  slotInterval: Duration.DurationInput = DEFAULT_SLOT_INTERVAL,
): Application {
  const logger = options.logger.withModule("node");
  const { chainSpec } = options;
  let slot = 0;

  const tick = Effect.suspend(() => {
    slot += 1;
    const { epoch, index } = slotPosition(slot, chainSpec.slotsPerEpoch);
    return index === 0
      ? logger.info("entered epoch", { epoch, slot })
      : logger.debug("slot", { slot, epoch });
  });

  return {
    name: chainSpec.chainId,
    start: () =>
      Effect.gen(function* () {
        yield* logger.info("node started", {
          chain: chainSpec.name,
          home: options.homeDir,
          modules: options.moduleManager.moduleNames().join(","),
        });
        yield* Effect.repeat(tick, Schedule.spaced(slotInterval));
      }),
    close: () => Effect.suspend(() => logger.info("node closed", { slot })),
  };
}

export const defaultAppCreator: AppCreator = (options) => Effect.sync(() => createNodeApplication(options));
