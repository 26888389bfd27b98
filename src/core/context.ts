import type { CommandField } from "./models.js";
import type { CommandExecutor } from "../utils/shell.js";
import type { FileReader } from "../utils/version.js";
import { consoleLogger, type Logger } from "../utils/logger.js";

export interface CollectCallbacks {
  onFieldStart?: (field: CommandField) => void;
  onFieldComplete?: (field: CommandField, durationMs: number) => void;
}

export interface CollectOptions {
  /** Replaces the process table, e.g. with fixtures in tests. */
  executor?: CommandExecutor;
  logger?: Logger;
  /** Node.js platform tag to detect the OS family from; defaults to the host's. */
  platform?: string;
  readFile?: FileReader;
  /** Node.js installation prefix holding include/node. */
  installDir?: string;
  callbacks?: CollectCallbacks;
}

export class CollectContext {
  readonly executor: CommandExecutor | undefined;
  readonly logger: Logger;
  readonly platform: string | undefined;
  readonly readFile: FileReader | undefined;
  readonly installDir: string | undefined;
  readonly callbacks: CollectCallbacks;

  constructor(opts: CollectOptions = {}) {
    this.executor = opts.executor;
    this.logger = opts.logger ?? consoleLogger;
    this.platform = opts.platform;
    this.readFile = opts.readFile;
    this.installDir = opts.installDir;
    this.callbacks = opts.callbacks ?? {};
  }
}
