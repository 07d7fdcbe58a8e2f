import { FileSystem } from "@effect/platform";
import { Effect } from "effect";

/**
 * Just enough of a file system for the stores: whole-file reads and writes, appends, renames.
 */
export const makeInMemoryFileSystem = (initial: Record<string, string> = {}) => {
  const files = new Map<string, string>(Object.entries(initial));

  const fs = FileSystem.makeNoop({
    exists: (path) => Effect.sync(() => files.has(path)),
    readFileString: (path) => Effect.sync(() => files.get(path) ?? ''),
    writeFileString: (path, data, options) => Effect.sync(() => {
      const previous = options?.flag === 'a' ? (files.get(path) ?? '') : '';
      files.set(path, previous + data);
    }),
    rename: (oldPath, newPath) => Effect.sync(() => {
      const content = files.get(oldPath);
      if (content !== undefined) {
        files.set(newPath, content);
        files.delete(oldPath);
      }
    }),
  });

  return { fs, files };
};
