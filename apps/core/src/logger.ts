import * as fs from "node:fs";
import * as path from "node:path";

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

type Level = "DEBUG" | "INFO" | "WARN" | "ERROR";

/**
 * Console output for a pipeline run plus the session's own log file.
 *
 * The log file is opened once the session id is known. Lines logged before that
 * (config, pipeline source) are held and written first. Resuming a session appends
 * to the same file, so one file tells the whole story of a session.
 */
export class Logger {
  private logFile: string | null = null;
  private held: string[] = [];
  private stage: string | null = null;
  private spinner: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly verbose: boolean,
    private readonly quiet = false,
  ) {}

  /** Open the session's log file and flush the lines held so far. Returns the path, or null if it cannot be written. */
  attachSession(pipelineKind: string, sessionId: string, filePath: string): string | null {
    const header = `# ${pipelineKind}/${sessionId} ${new Date().toISOString()}`;
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.appendFileSync(filePath, `${[header, ...this.held].join("\n")}\n`);
      this.logFile = filePath;
    } catch {
      this.logFile = null;
    }
    this.held = [];
    return this.logFile;
  }

  /** Tag following log-file lines with a stage; null between stages. */
  enterStage(stage: string | null): void {
    this.stage = stage;
  }

  get logFilePath(): string | null {
    return this.logFile;
  }

  private record(level: Level, message: string): void {
    const line = `${new Date().toISOString()} [${level}]${this.stage ? ` [${this.stage}]` : ""} ${message.trim()}`;
    if (this.logFile === null) {
      this.held.push(line);
      return;
    }
    try {
      fs.appendFileSync(this.logFile, `${line}\n`);
    } catch {
      // The run outlives its log file.
      this.logFile = null;
    }
  }

  info(message: string): void {
    this.record("INFO", message);
    if (!this.quiet) console.log(message);
  }

  warn(message: string): void {
    this.record("WARN", message);
    if (!this.quiet) console.warn(message);
  }

  error(message: string, err?: unknown): void {
    const detail = err instanceof Error ? err.message : String(err ?? "");
    const full = detail ? `${message}: ${detail}` : message;
    this.record("ERROR", full);
    if (!this.quiet) console.error(full);
  }

  /** Console only in verbose mode; always recorded. */
  debug(message: string): void {
    this.record("DEBUG", message);
    if (this.verbose && !this.quiet) console.log(message);
  }

  /** Streamed agent text, echoed in verbose mode and never recorded. */
  write(text: string): void {
    if (this.verbose && !this.quiet) process.stdout.write(text);
  }

  newline(): void {
    if (this.verbose && !this.quiet) process.stdout.write("\n");
  }

  /** Animated status line while an agent turn runs. Verbose mode streams instead. */
  startSpinner(message: string): void {
    this.record("INFO", message);
    if (this.verbose || this.quiet || !process.stdout.isTTY) return;
    this.stopSpinner();
    let frame = 0;
    process.stdout.write(`${SPINNER_FRAMES[frame]} ${message}`);
    this.spinner = setInterval(() => {
      frame = (frame + 1) % SPINNER_FRAMES.length;
      process.stdout.write(`\r${SPINNER_FRAMES[frame]} ${message}`);
    }, 80);
  }

  stopSpinner(): void {
    if (this.spinner === null) return;
    clearInterval(this.spinner);
    this.spinner = null;
    process.stdout.write("\r\x1b[K");
  }
}
