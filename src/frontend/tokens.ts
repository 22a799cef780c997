/**
 * @module tokens
 *
 * Token kinds 和关键字定义的统一出口。
 */

import { TokenKind } from '../types.js';
import { KW } from '../config/semantic.js';

export { TokenKind, KW };
