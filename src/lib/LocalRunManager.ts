/**
 * LocalRunManager - Launches the run configurations of a configured project
 */

import * as path from "path";
import {
  IProcessHandle,
  IRunManager,
  ProcessListener,
  RunConfiguration,
} from "../interfaces/IHostEnvironment";
import { BridgeError, ProjectSpec, RunConfigurationSpec } from "../types";
import { LocalProcessHandle } from "./LocalProcess";
import { ProcessTerminator } from "./ProcessTerminator";

export class LocalRunManager implements IRunManager {
  constructor(
    private readonly project: ProjectSpec,
    private readonly terminator: ProcessTerminator
  ) {}

  listConfigurations(): RunConfiguration[] {
    return this.project.runConfigurations.map((c) => ({ name: c.name }));
  }

  execute(configuration: RunConfiguration, listener: ProcessListener): IProcessHandle {
    const spec = this.find(configuration.name);
    const cwd = spec.cwd ? path.resolve(this.project.basePath, spec.cwd) : this.project.basePath;

    const handle = LocalProcessHandle.spawn(
      { command: spec.command, args: spec.args, cwd, env: spec.env },
      listener,
      this.terminator
    );
    console.error(
      `[LocalRunManager] Launched '${spec.name}' of ${this.project.name} (pid ${handle.pid ?? "pending"})`
    );
    return handle;
  }

  private find(name: string): RunConfigurationSpec {
    const spec = this.project.runConfigurations.find((c) => c.name === name);
    if (!spec) {
      throw new BridgeError(
        "RunConfigurationNotFound",
        `Run configuration '${name}' not found in project '${this.project.name}'`,
        { available: this.project.runConfigurations.map((c) => c.name) }
      );
    }
    return spec;
  }
}
