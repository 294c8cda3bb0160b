/**
 * LocalCompilerManager - Runs a project's build command and reports the
 * diagnostics it prints
 */

import { CompileStatusCallback, ICompilerManager } from "../interfaces/IHostEnvironment";
import { CommandSpec, CompileMessage, ProjectSpec } from "../types";
import { LocalProcessHandle } from "./LocalProcess";
import { OutputBuffer } from "./OutputBuffer";
import { ProcessTerminator } from "./ProcessTerminator";

/** Build output kept for diagnostics parsing */
const BUILD_OUTPUT_CAPACITY = 2_000_000;

// src/app.ts(12,5): error TS2322: Type 'string' is not assignable to type 'number'.
const TSC_LOCATED = /^(.+?)\((\d+),(\d+)\): (error|warning) (TS\d+): (.*)$/;
// error TS5058: The specified path does not exist: 'tsconfig.json'.
const TSC_GLOBAL = /^(error|warning) (TS\d+): (.*)$/;
// src/main.c:3:10: error: expected ';'   /   Main.java:7: warning: [unchecked] ...
const GCC_STYLE = /^(.+?):(\d+)(?::(\d+))?: (?:fatal )?(error|warning): (.*)$/;

function severityOf(word: string): CompileMessage["severity"] {
  return word === "error" ? "ERROR" : "WARNING";
}

/**
 * Extract compiler errors and warnings from build output
 */
export function parseCompilerOutput(output: string): CompileMessage[] {
  const messages: CompileMessage[] = [];

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trimEnd();

    let match = TSC_LOCATED.exec(line);
    if (match) {
      messages.push({
        message: `${match[5]}: ${match[6]}`,
        file: match[1],
        line: Number(match[2]),
        column: Number(match[3]),
        severity: severityOf(match[4]),
      });
      continue;
    }

    match = TSC_GLOBAL.exec(line);
    if (match) {
      messages.push({ message: `${match[2]}: ${match[3]}`, severity: severityOf(match[1]) });
      continue;
    }

    match = GCC_STYLE.exec(line);
    if (match) {
      const message: CompileMessage = {
        message: match[5],
        file: match[1],
        line: Number(match[2]),
        severity: severityOf(match[4]),
      };
      if (match[3] !== undefined) {
        message.column = Number(match[3]);
      }
      messages.push(message);
    }
  }

  return messages;
}

export class LocalCompilerManager implements ICompilerManager {
  private active = 0;

  constructor(
    private readonly project: ProjectSpec,
    private readonly terminator: ProcessTerminator
  ) {}

  make(callback: CompileStatusCallback): void {
    this.compile(this.project.build, callback);
  }

  rebuild(callback: CompileStatusCallback): void {
    this.compile(this.project.rebuild ?? this.project.build, callback);
  }

  isCompilationActive(): boolean {
    return this.active > 0;
  }

  private compile(command: CommandSpec | undefined, callback: CompileStatusCallback): void {
    if (!command) {
      callback(false, 0, 0, [
        {
          message: `No build command configured for project '${this.project.name}'`,
          severity: "INFO",
        },
      ]);
      return;
    }

    const output = new OutputBuffer(BUILD_OUTPUT_CAPACITY);
    const handle = LocalProcessHandle.spawn(
      { command: command.command, args: command.args, cwd: this.project.basePath },
      {
        onText: (text) => output.append(text),
        onTerminated: (exitCode) => {
          this.active--;
          const messages = parseCompilerOutput(output.read());
          const aborted = handle.terminationSignal() !== undefined;

          if (!aborted && exitCode !== 0 && !messages.some((m) => m.severity === "ERROR")) {
            messages.push({
              message: `Build command exited with code ${exitCode}`,
              severity: "ERROR",
            });
          }

          callback(
            aborted,
            messages.filter((m) => m.severity === "ERROR").length,
            messages.filter((m) => m.severity === "WARNING").length,
            messages
          );
        },
      },
      this.terminator
    );
    this.active++;
  }
}
