/**
 * @module config/controller
 *
 * 进程级标志注册表。
 *
 * 实体在未显式传入 `{ flags }` 时使用 `Controller`。首次加载本模块时，
 * 若设置了 `LANG_TEXT_FLAGS`，会从该路径读取标志配置文件；配置文件无效时
 * 记录错误并保留默认值。
 */

import { ConfigService } from './config-service.js';
import { FlagRegistry } from './flag-registry.js';
import { isFlagProfile, loadFlagProfile } from './flag-profile.js';
import { formatDiagnostic, type Diagnostic } from '../diagnostics/diagnostics.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('controller');

/**
 * 读取配置文件并应用到注册表。
 *
 * @returns 配置文件无效时的诊断；成功时为空数组
 */
export function applyFlagProfileFile(registry: FlagRegistry, filePath: string): Diagnostic[] {
  const result = loadFlagProfile(filePath);
  if (!isFlagProfile(result)) {
    logger.error('flag profile rejected, keeping current flags', undefined, {
      path: filePath,
      diagnostics: result.map(formatDiagnostic),
    });
    return result;
  }
  registry.applyProfile(result);
  return [];
}

function createController(): FlagRegistry {
  const registry = new FlagRegistry();
  const profilePath = ConfigService.getInstance().flagProfilePath;
  if (profilePath !== null) {
    applyFlagProfileFile(registry, profilePath);
  }
  return registry;
}

export const Controller: FlagRegistry = createController();
