/**
 * ServiceMessageParser - Builds a test result tree from the service
 * messages a test reporter writes to stdout
 *
 * Recognized lines look like
 *   ##teamcity[testStarted name='CartSpec.adds items']
 * with |-escaped attribute values. Other output is ignored. Feed output as
 * it arrives; the tree grows as messages come in.
 */

import { TestNode } from "../interfaces/IHostEnvironment";

export interface ServiceMessage {
  name: string;
  attributes: Record<string, string>;
}

const MESSAGE_LINE = /^##teamcity\[([A-Za-z][\w.-]*)(.*)\]\s*$/;
const ATTRIBUTE = /([\w.-]+)='((?:[^'|]|\|.)*)'/g;

const ESCAPES: Record<string, string> = {
  "'": "'",
  n: "\n",
  r: "\r",
  "|": "|",
  "[": "[",
  "]": "]",
  x: "\u0085",
  l: "\u2028",
  p: "\u2029",
};

export function unescapeValue(value: string): string {
  return value.replace(/\|(0x[0-9a-fA-F]{4}|.)/g, (match, code: string) => {
    if (code.startsWith("0x")) {
      return String.fromCharCode(parseInt(code.slice(2), 16));
    }
    return ESCAPES[code] ?? match;
  });
}

/**
 * Parse one output line; undefined when it is not a service message
 */
export function parseServiceMessage(line: string): ServiceMessage | undefined {
  const match = MESSAGE_LINE.exec(line.trim());
  if (!match) {
    return undefined;
  }

  const attributes: Record<string, string> = {};
  for (const attribute of match[2].matchAll(ATTRIBUTE)) {
    attributes[attribute[1]] = unescapeValue(attribute[2]);
  }
  return { name: match[1], attributes };
}

export class ServiceMessageParser {
  private tree?: TestNode;
  private suites: TestNode[] = [];
  private running = new Map<string, TestNode>();
  private pending = "";

  /**
   * Root of the tree; undefined until the first service message
   */
  root(): TestNode | undefined {
    return this.tree;
  }

  feed(text: string): void {
    const lines = (this.pending + text).split(/\r?\n/);
    this.pending = lines.pop() ?? "";
    for (const line of lines) {
      this.handleLine(line);
    }
  }

  /**
   * Flush the last partial line and settle what never finished
   */
  finish(): void {
    if (this.pending.length > 0) {
      this.handleLine(this.pending);
      this.pending = "";
    }

    for (const node of this.running.values()) {
      node.state = "defect";
      node.errorMessage = node.errorMessage ?? "Test did not finish";
    }
    this.running.clear();

    while (this.suites.length > 0) {
      const suite = this.suites.pop();
      if (suite) {
        ServiceMessageParser.settle(suite);
      }
    }
    if (this.tree) {
      ServiceMessageParser.settle(this.tree);
    }
  }

  private handleLine(line: string): void {
    const message = parseServiceMessage(line);
    if (!message) {
      return;
    }
    const name = message.attributes.name ?? "";

    switch (message.name) {
      case "testSuiteStarted": {
        const suite = this.add(name, false);
        this.suites.push(suite);
        break;
      }
      case "testSuiteFinished": {
        const suite = this.suites.pop();
        if (suite) {
          ServiceMessageParser.settle(suite);
        }
        break;
      }
      case "testStarted":
        this.running.set(name, this.add(name, true));
        break;
      case "testFinished": {
        const node = this.running.get(name) ?? this.add(name, true);
        this.running.delete(name);
        if (node.state === "running") {
          node.state = "passed";
        }
        const duration = Number(message.attributes.duration);
        if (Number.isFinite(duration)) {
          node.durationMs = duration;
        }
        break;
      }
      case "testFailed": {
        const node = this.running.get(name) ?? this.add(name, true);
        node.state = "defect";
        node.errorMessage = message.attributes.message;
        if (message.attributes.details) {
          node.stacktrace = message.attributes.details;
        }
        break;
      }
      case "testIgnored": {
        const node = this.running.get(name) ?? this.add(name, true);
        this.running.delete(name);
        node.state = "ignored";
        if (message.attributes.message) {
          node.errorMessage = message.attributes.message;
        }
        break;
      }
    }
  }

  private add(name: string, isLeaf: boolean): TestNode {
    if (!this.tree) {
      this.tree = { name: "[root]", isLeaf: false, state: "running", children: [] };
    }
    const parent = this.suites[this.suites.length - 1] ?? this.tree;
    const node: TestNode = { name, isLeaf, state: "running", parent, children: [] };
    parent.children.push(node);
    return node;
  }

  /**
   * Derive a suite's state from its children
   */
  private static settle(suite: TestNode): void {
    const states = suite.children.map((child) => child.state);
    if (states.includes("defect")) {
      suite.state = "defect";
    } else if (states.length > 0 && states.every((state) => state === "ignored")) {
      suite.state = "ignored";
    } else {
      suite.state = "passed";
    }
  }
}
