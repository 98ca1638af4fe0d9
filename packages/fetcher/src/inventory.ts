/**
 * On-disk model inventory, printed at the end of a run. It only reflects what
 * exists, which is also the implicit record of what failed.
 */

import { readdir, stat } from 'fs/promises';
import * as path from 'path';
import { formatSizeColumn } from '@model-bootstrap/utils';

export const MODEL_FILE_EXTENSIONS = ['.safetensors', '.bin', '.pt'] as const;

export interface InventoryFile {
  name: string;
  sizeBytes: number;
}

export interface InventorySection {
  subdir: string;
  files: InventoryFile[];
}

export type Inventory = InventorySection[];

const NAME_COLUMN_WIDTH = 60;

function isModelFile(name: string): boolean {
  const extension = path.extname(name).toLowerCase();
  return MODEL_FILE_EXTENSIONS.some((candidate) => candidate === extension);
}

function byName(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Subdirectories of `modelsDir` holding at least one model file, sorted by name
 */
export async function collectInventory(modelsDir: string): Promise<Inventory> {
  const entries = await readdir(modelsDir, { withFileTypes: true }).catch((error: unknown) => {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  });
  if (entries === null) {
    return [];
  }

  const subdirs = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort(byName);

  const inventory: Inventory = [];

  for (const subdir of subdirs) {
    const dir = path.join(modelsDir, subdir);
    const fileEntries = await readdir(dir, { withFileTypes: true });
    const names = fileEntries
      .filter((entry) => entry.isFile() && isModelFile(entry.name))
      .map((entry) => entry.name)
      .sort(byName);

    if (names.length === 0) {
      continue;
    }

    const files: InventoryFile[] = [];
    for (const name of names) {
      const { size } = await stat(path.join(dir, name));
      files.push({ name, sizeBytes: size });
    }
    inventory.push({ subdir, files });
  }

  return inventory;
}

export function formatInventory(inventory: Inventory): string[] {
  const lines: string[] = [];
  for (const section of inventory) {
    lines.push('', `  ${section.subdir}/`);
    for (const file of section.files) {
      lines.push(`    ${file.name.padEnd(NAME_COLUMN_WIDTH)}  ${formatSizeColumn(file.sizeBytes)}`);
    }
  }
  return lines;
}

export function inventoryContains(inventory: Inventory, subdir: string, name: string): boolean {
  return inventory.some(
    (section) => section.subdir === subdir && section.files.some((file) => file.name === name)
  );
}
