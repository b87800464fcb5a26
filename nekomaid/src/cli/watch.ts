import { watch, type FSWatcher } from "fs";
import { basename, dirname, resolve } from "path";

export interface FileWatch {
  close(): void;
}

/**
 * Calls `onChange` with the absolute path of any watched file that changes.
 * Watches each file's directory rather than the file, so a save that writes
 * a temporary file and renames it over the original keeps being seen.
 */
export function watchFiles(paths: Iterable<string>, onChange: (path: string) => void): FileWatch {
  const byDirectory = new Map<string, Set<string>>();
  for (const path of paths) {
    const file = resolve(path);
    const names = byDirectory.get(dirname(file)) ?? new Set<string>();
    names.add(basename(file));
    byDirectory.set(dirname(file), names);
  }

  const watchers: FSWatcher[] = [];
  for (const [directory, names] of byDirectory) {
    watchers.push(
      watch(directory, (_event, filename) => {
        if (!filename || !names.has(filename)) return;
        onChange(resolve(directory, filename));
      }),
    );
  }

  return {
    close() {
      for (const watcher of watchers) watcher.close();
    },
  };
}
