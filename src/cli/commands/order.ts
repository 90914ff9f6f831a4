/**
 * order command - Print the evaluation order of a manifest
 */

import { failure, resolveManifest, type CommandOutcome } from "./manifest.js";

export interface OrderOptions {
  json?: boolean;
}

export function orderCommand(filePath: string, options: OrderOptions = {}): CommandOutcome {
  try {
    const { order } = resolveManifest(filePath);
    return {
      exitCode: 0,
      lines: options.json ? [JSON.stringify(order)] : order,
    };
  } catch (error) {
    return failure(error);
  }
}
