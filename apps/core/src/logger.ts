import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

const DEFAULT_LOG_DIR = path.join(os.tmpdir(), "shacl-crew");

/** Thin logging wrapper for centralized output control. */
export class Logger {
  private spinnerInterval: ReturnType<typeof setInterval> | null = null;
  private spinnerFrame = 0;
  private readonly logFile: string | null;
  private static readonly SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

  constructor(
    private readonly verbose: boolean,
    runId: string,
    private readonly quiet = false,
    logDir: string = DEFAULT_LOG_DIR,
  ) {
    this.logFile = this.initLogFile(logDir, runId);
  }

  /** Try to create the log file. Returns the path on success, null on failure. */
  private initLogFile(logDir: string, runId: string): string | null {
    try {
      fs.mkdirSync(logDir, { recursive: true });
      const filePath = path.join(logDir, `crew-${runId}.log`);
      fs.writeFileSync(filePath, `# shacl-crew log: ${new Date().toISOString()}\n`);
      return filePath;
    } catch {
      return null;
    }
  }

  private appendLog(level: string, message: string): void {
    if (!this.logFile) return;
    try {
      fs.appendFileSync(this.logFile, `${new Date().toISOString()} [${level}] ${message}\n`);
    } catch {
      // The console still gets the line; the file is best effort.
    }
  }

  /** Path to the current run's log file, or null if logging failed to initialize. */
  get logFilePath(): string | null {
    return this.logFile;
  }

  info(message: string): void {
    this.appendLog("INFO", message);
    if (!this.quiet) console.log(message);
  }

  warn(message: string): void {
    this.appendLog("WARN", message);
    if (!this.quiet) console.warn(message);
  }

  error(message: string, err?: unknown): void {
    const detail = err instanceof Error ? err.message : String(err ?? "");
    const full = detail ? `${message}: ${detail}` : message;
    this.appendLog("ERROR", full);
    if (!this.quiet) console.error(full);
  }

  /** Write raw text to stdout (no newline). Used for streaming deltas. */
  write(text: string): void {
    if (this.verbose && !this.quiet) {
      process.stdout.write(text);
    }
  }

  newline(): void {
    if (this.verbose && !this.quiet) {
      process.stdout.write("\n");
    }
  }

  /** Log only when verbose mode is enabled. Always written to log file. */
  debug(message: string): void {
    this.appendLog("DEBUG", message);
    if (this.verbose && !this.quiet) {
      console.log(message);
    }
  }

  /** Show an animated spinner. No-op in verbose mode, quiet mode, or without a TTY. */
  startSpinner(message: string): void {
    this.appendLog("INFO", `[spinner] ${message}`);
    if (this.verbose || this.quiet || !process.stdout.isTTY) return;
    this.stopSpinner();
    this.spinnerFrame = 0;
    const frames = Logger.SPINNER_FRAMES;
    process.stdout.write(`${frames[0]} ${message}`);
    this.spinnerInterval = setInterval(() => {
      this.spinnerFrame = (this.spinnerFrame + 1) % frames.length;
      process.stdout.write(`\r${frames[this.spinnerFrame]} ${message}`);
    }, 80);
  }

  stopSpinner(): void {
    if (this.spinnerInterval !== null) {
      clearInterval(this.spinnerInterval);
      this.spinnerInterval = null;
      process.stdout.write("\r\x1b[K");
    }
  }
}
