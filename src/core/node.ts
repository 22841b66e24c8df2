/**
 * Default Node.js implementations of the injected I/O interfaces.
 */

import * as nodeFs from "fs";
import type { FileSystem, HttpClient } from "./interfaces";

export function createNodeFileSystem(): FileSystem {
  return {
    readFile: (path) => nodeFs.readFileSync(path, "utf-8"),
    readFileBinary: (path) => nodeFs.readFileSync(path),
    writeFile: (path, content) => nodeFs.writeFileSync(path, content, "utf-8"),
    writeFileBinary: (path, content) => nodeFs.writeFileSync(path, content),
    exists: (path) => nodeFs.existsSync(path),
    mkdir: (path, options) => {
      nodeFs.mkdirSync(path, options);
    },
    readdir: (path) => nodeFs.readdirSync(path).sort(),
    stat: (path) => {
      const stat = nodeFs.statSync(path);
      return {
        isDirectory: stat.isDirectory(),
        isFile: stat.isFile(),
        size: stat.size,
        mode: stat.mode & 0o777,
      };
    },
    unlink: (path) => nodeFs.unlinkSync(path),
  };
}

export function createFetchHttpClient(): HttpClient {
  return {
    fetch: (url, options) => fetch(url, options),
  };
}
