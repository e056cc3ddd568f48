import * as fs from 'fs-extra';
import * as path from 'path';

export class FileSystem {
  static async readJsonFile<T = unknown>(filePath: string): Promise<T | null> {
    try {
      if (!(await fs.pathExists(filePath))) {
        return null;
      }

      const content = await fs.readFile(filePath, 'utf8');
      return JSON.parse(content) as T;
    } catch (error) {
      throw new Error(
        `Failed to read JSON file ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  static async writeJsonFile(filePath: string, data: unknown): Promise<void> {
    try {
      await fs.ensureDir(path.dirname(filePath));
      // Write then rename so a concurrent `status` never sees half a file
      const tmpPath = `${filePath}.tmp`;
      await fs.writeFile(tmpPath, JSON.stringify(data, null, 2), 'utf8');
      await fs.rename(tmpPath, filePath);
    } catch (error) {
      throw new Error(
        `Failed to write JSON file ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  static async exists(targetPath: string): Promise<boolean> {
    return fs.pathExists(targetPath);
  }

  static async readTextFile(filePath: string): Promise<string | null> {
    if (!(await fs.pathExists(filePath))) {
      return null;
    }
    return fs.readFile(filePath, 'utf8');
  }

  static async writeTextFile(filePath: string, content: string): Promise<void> {
    try {
      await fs.ensureDir(path.dirname(filePath));
      await fs.writeFile(filePath, content, 'utf8');
    } catch (error) {
      throw new Error(
        `Failed to write file ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  static async openAppendFd(filePath: string): Promise<number> {
    await fs.ensureDir(path.dirname(filePath));
    return fs.open(filePath, 'a');
  }

  static async closeFd(fd: number): Promise<void> {
    await fs.close(fd);
  }

  static resolveFrom(baseDir: string, target: string): string {
    return path.isAbsolute(target) ? path.normalize(target) : path.resolve(baseDir, target);
  }
}
