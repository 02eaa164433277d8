import { XMLParser } from "fast-xml-parser";
import { BreakingChangeDetectionError } from "../errors.js";

/** One rule violation as reported by `buf breaking`, before classification. */
export type RawViolation = {
  type: string;
  message: string;
  path: string;
  line: number | null;
  column: number | null;
};

type Node = Record<string, unknown>;

function isNode(value: unknown): value is Node {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function str(node: Node, key: string): string | undefined {
  const v = node[key];
  return typeof v === "string" ? v : undefined;
}

function int(node: Node, key: string): number | null {
  const v = node[key];
  if (typeof v === "number" && Number.isInteger(v)) return v;
  if (typeof v === "string" && /^\d+$/.test(v)) return parseInt(v, 10);
  return null;
}

/**
 * Parse `--error-format json` output: one JSON object per line with
 * path, start_line, start_column, type and message.
 */
export function parseBufJsonLines(output: string): RawViolation[] {
  const violations: RawViolation[] = [];
  const lines = output.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line.length === 0) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      throw new BreakingChangeDetectionError(`Unparseable detector output at line ${i + 1}`, { line: line.slice(0, 200) });
    }
    if (!isNode(parsed)) {
      throw new BreakingChangeDetectionError(`Unexpected detector output at line ${i + 1}`, { line: line.slice(0, 200) });
    }

    const type = str(parsed, "type");
    const message = str(parsed, "message");
    if (!type || message === undefined) {
      throw new BreakingChangeDetectionError(`Violation without type or message at line ${i + 1}`, { line: line.slice(0, 200) });
    }
    violations.push({
      type,
      message,
      path: str(parsed, "path") ?? "",
      line: int(parsed, "start_line"),
      column: int(parsed, "start_column"),
    });
  }
  return violations;
}

// buf encodes the position into the failure message: "path:line:column:text"
const POSITIONED_MESSAGE = /^(.*?):(\d+):(\d+):(.*)$/s;

/**
 * Parse `--error-format junit` output. Each <testsuite> is a file, each
 * <testcase> a rule hit named `<RULE>_<line>_<column>`.
 */
export function parseBufJunit(xmlContent: string): RawViolation[] {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    isArray: (name) => name === "testsuite" || name === "testcase" || name === "failure",
  });

  let parsed: unknown;
  try {
    parsed = parser.parse(xmlContent, true);
  } catch (e) {
    throw new BreakingChangeDetectionError("Unparseable JUnit output from detector", {}, e);
  }
  if (!isNode(parsed)) return [];

  // Both a <testsuites> wrapper and bare <testsuite> elements occur
  const wrapper = parsed["testsuites"];
  const suites = isNode(wrapper) ? asArray(wrapper["testsuite"]) : asArray(parsed["testsuite"]);

  const violations: RawViolation[] = [];
  for (const suite of suites) {
    if (!isNode(suite)) continue;
    const suitePath = str(suite, "@_name") ?? "";

    for (const tc of asArray(suite["testcase"])) {
      if (!isNode(tc)) continue;
      const caseName = str(tc, "@_name") ?? "UNKNOWN";

      for (const failure of asArray(tc["failure"])) {
        const rawMessage = isNode(failure) ? str(failure, "@_message") ?? str(failure, "#text") ?? "" : String(failure);
        const declaredType = isNode(failure) ? str(failure, "@_type") : undefined;
        const m = POSITIONED_MESSAGE.exec(rawMessage);

        violations.push({
          type: declaredType ?? caseName.replace(/_\d+_\d+$/, ""),
          message: m ? m[4] : rawMessage,
          path: m ? m[1] : suitePath,
          line: m ? parseInt(m[2], 10) : null,
          column: m ? parseInt(m[3], 10) : null,
        });
      }
    }
  }
  return violations;
}
