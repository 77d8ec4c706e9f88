/**
 * Config Codec
 *
 * Converts a flat key/value configuration between its three forms:
 *
 *   string   key_1=value_1|key_2=value_2|...|key_n=value_n
 *   mapping  Map { key_1 => value_1, ... }
 *   XML      <job><key_1>value_1</key_1>...<tasks><task>...</task></tasks></job>
 *
 * Malformed pairs are skipped with a warning. A document that cannot be read
 * as XML fails the whole call: one error, failed report, empty result.
 */

import { XmlParseError, type ReportSink } from '@aligner/core';
import { createLogger } from '@aligner/utils';
import { resolveCodecOptions, type CodecOptions, type CodecOptionsInput } from './options.js';
import { findChild, parseConfigXml, type XmlElement, type XmlSource } from './xml.js';

const log = createLogger('config-codec');

const LINE_BREAK = /\r\n|\r|\n/;

export type ConfigMapping = Map<string, string>;

export type ConfigMappingLike = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

function isMap(mapping: ConfigMappingLike): mapping is ReadonlyMap<string, string> {
  return mapping instanceof Map;
}

export class ConfigCodec {
  readonly options: CodecOptions;

  constructor(options: CodecOptionsInput = {}) {
    this.options = resolveCodecOptions(options);
  }

  /**
   * Join the non-empty lines of a line-oriented config file into a config string
   */
  stringFromTextBlock(text: string | null | undefined): string {
    if (!text) {
      return '';
    }
    return text
      .split(LINE_BREAK)
      .filter((line) => line.length > 0)
      .join(this.options.pairSeparator);
  }

  mappingFromString(value: string | null | undefined, sink?: ReportSink): ConfigMapping {
    if (value === null || value === undefined) {
      return new Map();
    }
    return this.mappingFromPairs(value.split(this.options.pairSeparator), sink);
  }

  /**
   * Build a mapping from `key=value` tokens
   *
   * Empty tokens are ignored. A token is valid only when it splits into exactly
   * two non-empty parts; anything else is skipped and reported as a warning.
   * A repeated key keeps its last value.
   */
  mappingFromPairs(pairs: Iterable<string>, sink?: ReportSink): ConfigMapping {
    const { assignmentSymbol } = this.options;
    const mapping: ConfigMapping = new Map();

    for (const pair of pairs) {
      if (pair.length === 0) {
        continue;
      }

      const tokens = pair.split(assignmentSymbol);
      const [key, value] = tokens;
      if (tokens.length === 2 && key && value) {
        mapping.set(key, value);
        continue;
      }

      log.debug({ pair }, 'Skipping invalid pair');
      sink?.addWarning(`Invalid key${assignmentSymbol}value string: '${pair}'`);
    }

    return mapping;
  }

  stringFromMapping(mapping: ConfigMappingLike): string {
    const { assignmentSymbol, pairSeparator } = this.options;
    const entries = isMap(mapping) ? mapping.entries() : Object.entries(mapping);

    const parameters: string[] = [];
    for (const [key, value] of entries) {
      parameters.push(`${key}${assignmentSymbol}${value}`);
    }
    return parameters.join(pairSeparator);
  }

  /**
   * Read the job-level properties of an XML config: every direct child of the
   * root except the tasks container
   */
  mappingFromXmlJob(xml: XmlSource, sink: ReportSink): ConfigMapping {
    const parsed = parseConfigXml(xml);
    if (!parsed.ok) {
      this.reportXmlFailure(parsed.error, sink);
      return new Map();
    }

    const properties = parsed.root.children.filter(
      (element) => element.tag !== this.options.tasksTag
    );
    return this.mappingFromElements(properties);
  }

  /**
   * Read one mapping per task element of an XML config, in document order
   */
  mappingsFromXmlTasks(xml: XmlSource, sink: ReportSink): ConfigMapping[] {
    const parsed = parseConfigXml(xml);
    if (!parsed.ok) {
      this.reportXmlFailure(parsed.error, sink);
      return [];
    }

    const { tasksTag, taskTag } = this.options;
    const container = findChild(parsed.root, tasksTag);
    if (!container) {
      this.reportXmlFailure(
        new XmlParseError('structure', `Missing <${tasksTag}> element in <${parsed.root.tag}>`),
        sink
      );
      return [];
    }

    return container.children
      .filter((element) => element.tag === taskTag)
      .map((task) => this.mappingFromElements(task.children));
  }

  /**
   * Elements whose text does not form a valid pair are dropped without a warning
   */
  private mappingFromElements(elements: XmlElement[]): ConfigMapping {
    const pairs: string[] = [];
    for (const element of elements) {
      if (element.text !== null) {
        pairs.push(`${element.tag}${this.options.assignmentSymbol}${element.text.trim()}`);
      }
    }
    return this.mappingFromPairs(pairs);
  }

  private reportXmlFailure(error: XmlParseError, sink: ReportSink): void {
    log.debug({ kind: error.kind, details: error.details }, error.message);
    sink.markFailed();
    sink.addError(`An error occurred while parsing XML file: ${error.message}`);
  }
}

/**
 * Codec with the default separators (`|`, `=`) and tags (`tasks`, `task`)
 */
export const configCodec = new ConfigCodec();
