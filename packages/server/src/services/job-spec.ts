import { InvalidRequestError } from "../errors.js";

export const DEFAULT_CONFIGURATION = "Debug";

/** A build request with defaults applied. */
export interface BuildSpec {
  project?: string;
  workspace?: string;
  scheme: string;
  configuration: string;
  destination?: string;
  derivedDataPath?: string;
  extraArgs: string[];
}

export interface TestSpec {
  project?: string;
  workspace?: string;
  scheme: string;
  destination?: string;
  testPlan?: string;
  onlyTesting: string[];
  skipTesting: string[];
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

type Body = Record<string, unknown>;

function asBody(raw: unknown): Body {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new InvalidRequestError("request body must be a JSON object");
  }
  return Object.fromEntries(Object.entries(raw));
}

function optionalString(body: Body, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new InvalidRequestError(`${field} must be a string`);
  }
  return value.length > 0 ? value : undefined;
}

function stringList(body: Body, field: string): string[] {
  const value = body[field];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new InvalidRequestError(`${field} must be an array of strings`);
  }
  return [...value];
}

function requireRoot(body: Body): { project?: string; workspace?: string } {
  const project = optionalString(body, "project");
  const workspace = optionalString(body, "workspace");
  if (!project && !workspace) {
    throw new InvalidRequestError("Either project or workspace must be specified");
  }
  return { project, workspace };
}

function requireScheme(body: Body): string {
  const scheme = optionalString(body, "scheme");
  if (!scheme) {
    throw new InvalidRequestError("scheme must be specified");
  }
  return scheme;
}

export function parseBuildRequest(raw: unknown): BuildSpec {
  const body = asBody(raw);
  return {
    ...requireRoot(body),
    scheme: requireScheme(body),
    configuration: optionalString(body, "configuration") ?? DEFAULT_CONFIGURATION,
    destination: optionalString(body, "destination"),
    derivedDataPath: optionalString(body, "derivedDataPath"),
    extraArgs: stringList(body, "extraArgs"),
  };
}

export function parseTestRequest(raw: unknown): TestSpec {
  const body = asBody(raw);
  return {
    ...requireRoot(body),
    scheme: requireScheme(body),
    destination: optionalString(body, "destination"),
    testPlan: optionalString(body, "testPlan"),
    onlyTesting: stringList(body, "onlyTesting"),
    skipTesting: stringList(body, "skipTesting"),
  };
}

/** Filesystem paths a spec refers to, for the allowlist check. */
export function specPaths(spec: BuildSpec | TestSpec): string[] {
  return [spec.project, spec.workspace].filter((p): p is string => p !== undefined);
}

// ---------------------------------------------------------------------------
// Command-line translation
// ---------------------------------------------------------------------------

function pair(args: string[], flag: string, value: string | undefined): void {
  if (value !== undefined) args.push(flag, value);
}

export function buildArgs(spec: BuildSpec): string[] {
  const args: string[] = [];
  pair(args, "-project", spec.project);
  pair(args, "-workspace", spec.workspace);
  pair(args, "-scheme", spec.scheme);
  pair(args, "-configuration", spec.configuration);
  pair(args, "-destination", spec.destination);
  pair(args, "-derivedDataPath", spec.derivedDataPath);
  args.push(...spec.extraArgs);
  return args;
}

export function testArgs(spec: TestSpec): string[] {
  const args = ["test"];
  pair(args, "-project", spec.project);
  pair(args, "-workspace", spec.workspace);
  pair(args, "-scheme", spec.scheme);
  pair(args, "-destination", spec.destination);
  pair(args, "-testPlan", spec.testPlan);
  for (const test of spec.onlyTesting) args.push("-only-testing", test);
  for (const test of spec.skipTesting) args.push("-skip-testing", test);
  return args;
}
