/**
 * Resolves the project an operation targets
 */

import { IHostEnvironment, IHostProject } from "../interfaces/IHostEnvironment";
import { Outcome } from "../types";
import { ErrorHandler } from "./ErrorHandler";

/**
 * Pick the project named by projectRef (name or base path), or the first
 * open project when no reference is given
 */
export function resolveProject(
  host: IHostEnvironment,
  projectRef?: string
): Outcome<{ project: IHostProject }> {
  const projects = host.openProjects();

  if (projects.length === 0) {
    return {
      success: false,
      failure: ErrorHandler.failure("NoProjectOpen", "No project is open"),
    };
  }

  if (projectRef === undefined || projectRef === "") {
    return { success: true, project: projects[0] };
  }

  const match = projects.find(
    (p) => p.info.name === projectRef || p.info.basePath === projectRef
  );
  if (match) {
    return { success: true, project: match };
  }

  return {
    success: false,
    failure: ErrorHandler.failure(
      "NoProjectOpen",
      `No open project matches '${projectRef}'`,
      { available: projects.map((p) => p.info.name) }
    ),
  };
}
