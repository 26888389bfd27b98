import { availableParallelism } from "node:os";
import { NOT_AVAILABLE, type CommandField, type OsFamily, type SystemSnapshot } from "./models.js";
import { CollectContext } from "./context.js";
import { COLLECTOR_REGISTRY } from "../collectors/index.js";
import { CommandRunner } from "../utils/shell.js";
import { detectOsFamily } from "../utils/platform.js";
import { platformVersion, runtimeVersion } from "../utils/version.js";

export class SystemInfoCollector {
  collect(ctx: CollectContext = new CollectContext()): SystemSnapshot {
    const runner = new CommandRunner({ executor: ctx.executor, logger: ctx.logger });
    const osFamily = detectOsFamily(ctx.platform);

    const snapshot: SystemSnapshot = {
      runtimeVersion: runtimeVersion(),
      platformVersion: platformVersion({
        readFile: ctx.readFile,
        installDir: ctx.installDir,
        logger: ctx.logger,
      }),
      coreCount: availableParallelism(),
      osFamily,
      cpuModel: this.collectField("cpuModel", osFamily, runner, ctx),
      availableMemory: this.collectField("availableMemory", osFamily, runner, ctx),
    };

    return Object.freeze(snapshot);
  }

  private collectField(
    field: CommandField,
    family: OsFamily,
    runner: CommandRunner,
    ctx: CollectContext,
  ): string {
    ctx.callbacks.onFieldStart?.(field);
    const start = Date.now();

    let value: string;
    try {
      value = COLLECTOR_REGISTRY[field].collect(family, runner);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      ctx.logger.warn(`Could not determine ${field}: ${reason}`);
      value = NOT_AVAILABLE;
    }

    ctx.callbacks.onFieldComplete?.(field, Date.now() - start);
    return value;
  }
}
