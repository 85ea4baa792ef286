/**
 * Local-file transport: reads previously saved SOS responses from disk so
 * they go through the same import path as live requests.
 */

import { readFile } from "node:fs/promises";
import type { SosTransport } from "@gwsos/clients-core";

export function createFileTransport(): SosTransport {
  return {
    getXml: (path: string) => readFile(path, "utf-8"),
  };
}
