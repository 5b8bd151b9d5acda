import fs from "node:fs";
import path from "node:path";

// *.xml files under `targetPath` (or the file itself), sorted by path.
export function listXmlFiles(targetPath: string, recursive: boolean): string[] {
  const resolved = path.resolve(targetPath);
  if (!fs.existsSync(resolved)) throw new Error(`Path not found: ${resolved}`);
  if (!fs.statSync(resolved).isDirectory()) return isXmlFile(resolved) ? [resolved] : [];

  const found: string[] = [];
  const walk = (dir: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (recursive) walk(full);
      } else if (entry.isFile() && isXmlFile(full)) {
        found.push(full);
      }
    }
  };
  walk(resolved);
  return found.sort();
}

function isXmlFile(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === ".xml";
}
