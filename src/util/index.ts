export {
  escapeLiteral, isInsideStringLiteral, isBlank, leadingWhitespace,
  displayWidth, indexOutsideString,
} from './strings.js';
export { ConfigError, ok, fail, describeError } from './errors.js';
