/**
 * @aligner/config
 *
 * Configuration codec:
 * - Config strings, mappings and XML job/task documents
 * - Codec options (separators and tag names)
 * - Typed XML reading
 */

export {
  ConfigCodec,
  configCodec,
  type ConfigMapping,
  type ConfigMappingLike,
} from './codec.js';

export {
  resolveCodecOptions,
  DEFAULT_CODEC_OPTIONS,
  type CodecOptions,
  type CodecOptionsInput,
} from './options.js';

export {
  parseConfigXml,
  findChild,
  type XmlElement,
  type XmlParseOutcome,
  type XmlSource,
} from './xml.js';
