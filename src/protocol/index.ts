/**
 * Protocol layer exports for imap-response-decoder
 */

export {
  decodeResponse,
  decodeResponseOrThrow,
  isTaggedResponse,
  isContinuationResponse,
  response
} from './parser.js';

export {
  envelope,
  msgAtt,
  msgAttList,
  respText,
  respTextCode,
  type ResponseText
} from './response-parser.js';

export {
  address,
  addressList,
  astring,
  atom,
  flag,
  flagList,
  literal,
  nstring,
  number,
  number64,
  quoted,
  status,
  string,
  tag,
  text,
  isAstringChar,
  isAtomChar,
  isAtomSpecial,
  isTagChar
} from './tokenizer.js';

export type { Input, ParseResult, Rule, Done, Incomplete, Failure } from './result.js';

export { ResponseEncoder } from './encoder.js';

export { ResponseReader, DEFAULT_MAX_BUFFER_SIZE, type ResponseReaderEvents } from './response-reader.js';

export { buildMailboxState, applyMailboxResponse } from './mailbox-state.js';
