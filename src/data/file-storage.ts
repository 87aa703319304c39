/** FileStorage - 数据目录内的原子化文件操作，确保数据完整性 */

import { promises as fs } from "node:fs";
import * as path from "node:path";
import { Result, ok, err } from "../types";

type FsErrorCode =
  | "E301_FILE_NOT_FOUND"
  | "E302_PERMISSION_DENIED"
  | "E303_DISK_FULL"
  | "E500_INTERNAL_ERROR";

function readErrnoCode(error: unknown): string {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : "";
  }
  return "";
}

export function mapFsErrorToErrorCode(error: unknown): FsErrorCode {
  const code = readErrnoCode(error);

  if (code === "ENOENT") {
    return "E301_FILE_NOT_FOUND";
  }
  if (code === "EACCES" || code === "EPERM") {
    return "E302_PERMISSION_DENIED";
  }
  if (code === "ENOSPC") {
    return "E303_DISK_FULL";
  }

  return "E500_INTERNAL_ERROR";
}

/** 数据文件路径常量（相对数据目录） */
export const SETTINGS_FILE = "settings.json";
export const USER_PREFIXES_FILE = "registered-prefixes.json";
export const APP_LOG_FILE = "logs/cif-model.log";

/** FileStorage 配置 */
export interface FileStorageOptions {
  /** 数据目录（绝对路径或相对当前工作目录） */
  dataDir: string;
}

/** FileStorage 实现类 - 目录初始化、原子写入、数据完整性校验 */
export class FileStorage {
  private readonly dataDir: string;

  constructor(options: FileStorageOptions) {
    this.dataDir = options.dataDir;
  }

  /** 数据目录 */
  getDataDir(): string {
    return this.dataDir;
  }

  /** 解析完整路径；拒绝逃出数据目录的相对路径 */
  resolvePath(relativePath: string): string {
    const root = path.resolve(this.dataDir);
    const fullPath = path.resolve(root, relativePath);
    if (fullPath !== root && !fullPath.startsWith(root + path.sep)) {
      throw new Error(`Path escapes data directory: ${relativePath}`);
    }
    return fullPath;
  }

  /** 初始化数据目录 */
  async initialize(): Promise<Result<void>> {
    return this.ensureDir(".");
  }

  /** 读取文本文件 */
  async read(relativePath: string): Promise<Result<string>> {
    try {
      const content = await fs.readFile(this.resolvePath(relativePath), "utf-8");
      return ok(content);
    } catch (error) {
      return err(
        mapFsErrorToErrorCode(error),
        `Failed to read file: ${relativePath}`,
        error
      );
    }
  }

  /** 写入文本文件（原子写入） */
  async write(relativePath: string, content: string): Promise<Result<void>> {
    return this.atomicWrite(relativePath, content);
  }

  /** 读取并解析 JSON */
  async readJSON(relativePath: string): Promise<Result<unknown>> {
    const readResult = await this.read(relativePath);
    if (!readResult.ok) {
      return readResult;
    }

    try {
      const data: unknown = JSON.parse(readResult.value);
      return ok(data);
    } catch (error) {
      return err(
        "E401_CONFIG_INVALID",
        `Failed to parse JSON file: ${relativePath}`,
        error
      );
    }
  }

  /** 序列化并写入 JSON */
  async writeJSON(relativePath: string, data: unknown): Promise<Result<void>> {
    return this.atomicWrite(relativePath, JSON.stringify(data, null, 2));
  }

  /**
   * 原子写入
   *
   * 先写临时文件并校验，再 rename 覆盖目标文件。
   */
  async atomicWrite(relativePath: string, content: string): Promise<Result<void>> {
    let fullPath: string;
    try {
      fullPath = this.resolvePath(relativePath);
    } catch (error) {
      return err("E101_INVALID_INPUT", `Invalid path: ${relativePath}`, error);
    }
    const tempPath = `${fullPath}.${process.pid}.${Date.now()}.tmp`;

    try {
      await fs.mkdir(path.dirname(fullPath), { recursive: true });

      // 步骤 1: 写入临时文件
      await fs.writeFile(tempPath, content, "utf-8");

      // 步骤 2: 校验写入完整性
      const verifyResult = await this.verifyWriteIntegrity(tempPath, content);
      if (!verifyResult.ok) {
        await this.cleanupTempFile(tempPath);
        return verifyResult;
      }

      // 步骤 3: 重命名临时文件为目标文件
      await fs.rename(tempPath, fullPath);
      return ok(undefined);
    } catch (error) {
      await this.cleanupTempFile(tempPath);
      return err(
        mapFsErrorToErrorCode(error),
        `Atomic write failed for file: ${relativePath}`,
        error
      );
    }
  }

  /** 校验写入完整性 */
  private async verifyWriteIntegrity(
    tempPath: string,
    expectedContent: string
  ): Promise<Result<void>> {
    const actualContent = await fs.readFile(tempPath, "utf-8");
    if (actualContent !== expectedContent) {
      return err(
        "E500_INTERNAL_ERROR",
        "Write integrity check failed: content mismatch",
        { expected: expectedContent.length, actual: actualContent.length }
      );
    }
    return ok(undefined);
  }

  /** 清理临时文件 */
  private async cleanupTempFile(tempPath: string): Promise<void> {
    await fs.rm(tempPath, { force: true });
  }

  /** 删除文件；文件不存在视为成功 */
  async delete(relativePath: string): Promise<Result<void>> {
    try {
      await fs.rm(this.resolvePath(relativePath), { force: true });
      return ok(undefined);
    } catch (error) {
      return err(
        mapFsErrorToErrorCode(error),
        `Failed to delete file: ${relativePath}`,
        error
      );
    }
  }

  /** 检查文件是否存在 */
  async exists(relativePath: string): Promise<boolean> {
    try {
      await fs.stat(this.resolvePath(relativePath));
      return true;
    } catch {
      return false;
    }
  }

  /** 确保目录存在 */
  async ensureDir(relativePath: string): Promise<Result<void>> {
    try {
      const fullPath = this.resolvePath(relativePath);
      await fs.mkdir(fullPath, { recursive: true });
      const stat = await fs.stat(fullPath);
      if (!stat.isDirectory()) {
        return err(
          "E500_INTERNAL_ERROR",
          `Path exists but is not a directory: ${relativePath}`
        );
      }
      return ok(undefined);
    } catch (error) {
      return err(
        mapFsErrorToErrorCode(error),
        `Failed to create directory: ${relativePath}`,
        error
      );
    }
  }
}
