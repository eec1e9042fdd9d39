/**
 * File System Abstraction
 * Allows for easy testing with in-memory implementation
 */

import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * File system interface
 */
export interface FileSystem {
  /**
   * Write content to file (overwrites), creating its directory
   */
  write(path: string, content: string): Promise<void>;

  /**
   * Create directory (recursive)
   */
  mkdir(dirPath: string): Promise<void>;
}

/**
 * Real file system implementation using Node.js fs
 */
export class RealFileSystem implements FileSystem {
  async write(filePath: string, content: string): Promise<void> {
    await this.mkdir(path.dirname(filePath));
    await fs.writeFile(filePath, content, 'utf-8');
  }

  async mkdir(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath, { recursive: true });
  }
}

/**
 * In-memory file system for testing
 */
export class InMemoryFileSystem implements FileSystem {
  private files = new Map<string, string>();
  private directories = new Set<string>();

  async write(filePath: string, content: string): Promise<void> {
    await this.mkdir(path.dirname(filePath));
    this.files.set(this.normalizePath(filePath), content);
  }

  async mkdir(dirPath: string): Promise<void> {
    this.directories.add(this.normalizePath(dirPath));
  }

  async read(filePath: string): Promise<string> {
    const content = this.files.get(this.normalizePath(filePath));
    if (content === undefined) {
      throw new Error(`ENOENT: no such file or directory, open '${filePath}'`);
    }
    return content;
  }

  /**
   * File names directly under `dirPath`, sorted
   */
  async list(dirPath: string): Promise<string[]> {
    const normalized = this.normalizePath(dirPath);
    const results: string[] = [];

    for (const filePath of this.files.keys()) {
      if (this.normalizePath(path.dirname(filePath)) === normalized) {
        results.push(path.basename(filePath));
      }
    }

    return results.sort();
  }

  getAllFiles(): string[] {
    return Array.from(this.files.keys());
  }

  private normalizePath(p: string): string {
    return path.normalize(p).replace(/\\/g, '/');
  }
}
