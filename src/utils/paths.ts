import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * 从 `moduleUrl` 所在目录向上查找名为 `name` 的文件。
 * 源码（src/...）与编译产物（dist/src/...）的目录深度不同，因此不写死相对层级。
 *
 * @throws {Error} 一直到文件系统根目录都没有找到
 */
export function findUp(name: string, moduleUrl: string): string {
  let dir = dirname(fileURLToPath(moduleUrl));
  for (;;) {
    const candidate = join(dir, name);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) throw new Error(`${name} not found above ${fileURLToPath(moduleUrl)}`);
    dir = parent;
  }
}
