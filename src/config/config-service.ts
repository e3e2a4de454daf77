/**
 * @module config-service
 *
 * 统一配置管理服务：集中管理所有环境变量配置。
 *
 * **设计目标**：
 * - 单一数据源：所有配置从 ConfigService 获取，避免散落的 process.env 访问
 * - 延迟初始化：使用单例模式，首次访问时初始化
 *
 * **环境变量**：
 * - `LOG_LEVEL`：日志级别（DEBUG / INFO / WARN / ERROR，默认 INFO）
 * - `LANG_TEXT_FLAGS`：标志配置文件路径，Controller 首次创建时加载
 *
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * const config = ConfigService.getInstance();
 * if (config.flagProfilePath) {
 *   // 加载标志配置文件
 * }
 * ```
 */

import { LogLevel } from '../utils/logger.js';

export class ConfigService {
  private static instance: ConfigService | null = null;

  /** 日志级别（默认 INFO） */
  readonly logLevel: LogLevel;

  /** 标志配置文件路径（可选） */
  readonly flagProfilePath: string | null;

  private constructor() {
    this.logLevel = this.parseLogLevel(process.env.LOG_LEVEL);
    this.flagProfilePath = process.env.LANG_TEXT_FLAGS?.trim() || null;
  }

  /**
   * 解析 LOG_LEVEL 环境变量为 LogLevel 枚举值。
   *
   * @param raw - 原始环境变量值
   * @returns 解析后的 LogLevel，默认 INFO
   */
  private parseLogLevel(raw: string | undefined): LogLevel {
    if (!raw) return LogLevel.INFO;
    switch (raw.trim().toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'WARN':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        return LogLevel.INFO;
    }
  }

  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  /**
   * 重置单例实例（仅用于测试）。
   *
   * 重置后，下次调用 getInstance() 会重新读取环境变量。
   */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}
