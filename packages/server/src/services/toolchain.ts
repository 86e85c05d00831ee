import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { ToolchainUnavailableError } from "../errors.js";

const execFileAsync = promisify(execFile);

/**
 * Ask the build tool for its version. The first line of `<tool> -version`
 * is returned, e.g. "Xcode 16.1". Throws ToolchainUnavailableError when
 * the tool is missing or exits non-zero.
 */
export async function detectToolVersion(tool: string): Promise<string> {
  try {
    const { stdout } = await execFileAsync(tool, ["-version"], { timeout: 30_000 });
    const first = stdout.split("\n").find((line) => line.trim().length > 0);
    return first?.trim() ?? "Unknown";
  } catch (err) {
    throw new ToolchainUnavailableError(tool, err);
  }
}
