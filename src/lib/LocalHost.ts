/**
 * LocalHost - Host environment over plain child processes
 *
 * Projects come from configuration. There is no debugger backend, so debug
 * tools report that no session is active.
 */

import { IHostEnvironment, IHostProject } from "../interfaces/IHostEnvironment";
import { BridgeConfig, ProjectSpec } from "../types";
import { ApplicationContext } from "./ApplicationContext";
import { LocalCompilerManager } from "./LocalCompilerManager";
import { LocalRunManager } from "./LocalRunManager";
import { LocalTestLauncher } from "./LocalTestLauncher";
import { ProcessTerminator } from "./ProcessTerminator";

export class LocalHost implements IHostEnvironment {
  readonly context = new ApplicationContext();
  private readonly projects: IHostProject[];

  constructor(config: Pick<BridgeConfig, "projects" | "terminationGraceMs">) {
    const terminator = new ProcessTerminator(config.terminationGraceMs);
    this.projects = config.projects.map((spec) => LocalHost.createProject(spec, terminator));

    console.error(
      `[LocalHost] ${this.projects.length} project(s): ` +
        (this.projects.map((p) => p.info.name).join(", ") || "none")
    );
  }

  openProjects(): IHostProject[] {
    return this.projects;
  }

  private static createProject(spec: ProjectSpec, terminator: ProcessTerminator): IHostProject {
    return {
      info: { name: spec.name, basePath: spec.basePath },
      compiler: new LocalCompilerManager(spec, terminator),
      runManager: new LocalRunManager(spec, terminator),
      testLauncher: spec.test
        ? new LocalTestLauncher(spec.basePath, spec.test, terminator)
        : undefined,
    };
  }
}
