/**
 * Siemens printed-protocol XML parser.
 *
 * The scanner exports a document with a table of contents (PrintTOC) listing
 * programs and their protocols, and a PrintProtocol section holding one
 * SubStep per protocol:
 *
 *   <PrintTOC><TOC>
 *     <HeaderTitle>...</HeaderTitle>
 *     <root><region><NormalExam_dot_engine>
 *       <Program name="..."><Protocol name="..."/></Program>
 *   </NormalExam_dot_engine></region></root></TOC></PrintTOC>
 *   <PrintProtocol><Protocol>
 *     <SubStep>
 *       <ProtHeaderInfo>
 *         <HeaderProtPath>\\...\program\sequence</HeaderProtPath>
 *         <HeaderProperty>...</HeaderProperty>
 *       </ProtHeaderInfo>
 *       <Card name="Routine">
 *         <ProtParameter><Label>TR</Label><ValueAndUnit>2300 ms</ValueAndUnit></ProtParameter>
 *       </Card>
 *     </SubStep>
 *   </Protocol></PrintProtocol>
 *
 * Element order and optional elements are tolerated. A malformed SubStep is
 * kept with its parameters unrecognized; only a document that cannot be read
 * at all fails the parse.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ProtocolError, ProtocolParseError } from '../errors.js';
import { getLogger } from '../logging/logger.js';
import { splitValueAndUnit } from '../parameter/coercion.js';
import { ImagingProtocol } from '../protocol/ImagingProtocol.js';
import { getParameterRegistry, type ParameterRegistry } from '../registry/ParameterRegistry.js';
import { ImagingSequence, type HeaderEntry } from '../sequence/ImagingSequence.js';
import type { ProtocolParseOptions, ProtocolParser } from './types.js';

const log = getLogger('xml');

// ============================================================================
// Types
// ============================================================================

type XmlNode = Record<string, unknown>;

interface SubStepBlock {
  /** 1-based position in the document */
  index: number;
  program: string | undefined;
  name: string;
  headerProperty: string | undefined;
  entries: HeaderEntry[];
  problems: string[];
}

interface SiemensDocument {
  headerTitle: string | undefined;
  programs: string[];
  blocks: SubStepBlock[];
}

const ATTRIBUTE_PREFIX = '@_';

/** Program name used when neither the TOC nor any header path names one. */
export const DEFAULT_PROGRAM = 'Default';

const PHASE_DIRECTIONS: Readonly<Record<string, string>> = {
  'A >> P': 'COL',
  'P >> A': 'COL',
  'R >> L': 'ROW',
  'L >> R': 'ROW',
};

// ============================================================================
// Node helpers
// ============================================================================

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function child(node: unknown, key: string): unknown {
  if (Array.isArray(node)) return child(node[0], key);
  return isNode(node) ? node[key] : undefined;
}

function path(node: unknown, ...keys: string[]): unknown {
  return keys.reduce<unknown>((current, key) => child(current, key), node);
}

function textOf(node: unknown): string | undefined {
  if (typeof node === 'string') return node.trim();
  if (typeof node === 'number' || typeof node === 'boolean') return String(node);
  if (isNode(node)) return textOf(node['#text']);
  return undefined;
}

function attribute(node: unknown, name: string): string | undefined {
  return isNode(node) ? textOf(node[`${ATTRIBUTE_PREFIX}${name}`]) : undefined;
}

/** Child elements of a node, whatever their tag names. */
function elements(node: unknown): unknown[] {
  if (!isNode(node)) return [];
  return Object.entries(node)
    .filter(([key]) => !key.startsWith(ATTRIBUTE_PREFIX) && key !== '#text')
    .flatMap(([, value]) => asArray(value));
}

// ============================================================================
// Document reading
// ============================================================================

function parseXml(xml: string): XmlNode {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new ProtocolParseError(`Malformed XML: ${validation.err.msg}`, validation.err.line);
  }
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
  });
  const parsed: unknown = parser.parse(xml);
  const root = Object.entries(isNode(parsed) ? parsed : {}).find(
    ([key, value]) => !key.startsWith('?') && isNode(value)
  );
  if (root === undefined || !isNode(root[1])) {
    throw new ProtocolParseError('Document has no root element');
  }
  return root[1];
}

function readPrograms(root: XmlNode): string[] {
  const engine = path(root, 'PrintTOC', 'TOC', 'root', 'region', 'NormalExam_dot_engine');
  const programs: string[] = [];
  for (const program of elements(engine)) {
    const name = attribute(program, 'name');
    if (name && !programs.includes(name)) programs.push(name);
  }
  return programs;
}

function readBlock(
  step: unknown,
  index: number,
  convertPhaseEncoding: boolean,
  registry: ParameterRegistry
): SubStepBlock {
  const problems: string[] = [];
  const header = child(step, 'ProtHeaderInfo');
  const headerPath = textOf(child(header, 'HeaderProtPath'));
  const segments = (headerPath ?? '')
    .split('\\')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

  if (segments.length < 2) {
    problems.push(headerPath ? `header path '${headerPath}' has no program segment` : 'missing HeaderProtPath');
  }
  const name = segments.at(-1) ?? `SubStep ${index}`;
  const program = segments.length >= 2 ? segments.at(-2) : undefined;

  const entries: HeaderEntry[] = [];
  for (const card of asArray(child(step, 'Card'))) {
    const cardName = attribute(card, 'name') ?? '?';
    for (const parameter of elements(card)) {
      const label = textOf(child(parameter, 'Label'));
      const valueText = textOf(child(parameter, 'ValueAndUnit'));
      if (!label) {
        problems.push(`parameter without Label in card '${cardName}'`);
        continue;
      }
      if (valueText === undefined) {
        problems.push(`parameter '${label}' without ValueAndUnit in card '${cardName}'`);
        continue;
      }
      entries.push(toEntry(label, valueText, convertPhaseEncoding, registry));
    }
  }

  return {
    index,
    program,
    name,
    headerProperty: textOf(child(header, 'HeaderProperty')),
    entries,
    problems,
  };
}

function toEntry(
  label: string,
  valueText: string,
  convertPhaseEncoding: boolean,
  registry: ParameterRegistry
): HeaderEntry {
  const { value, unit } = splitValueAndUnit(valueText);
  const resolved = registry.resolve(label);
  if (convertPhaseEncoding && resolved.recognized && resolved.name === 'PhaseEncodingDirection') {
    const converted = PHASE_DIRECTIONS[value];
    if (converted !== undefined) return { key: label, value: converted };
  }
  return { key: label, value, unit };
}

function readDocument(
  xml: string,
  convertPhaseEncoding: boolean,
  registry: ParameterRegistry
): SiemensDocument {
  const root = parseXml(xml);
  const hasToc = child(root, 'PrintTOC') !== undefined;
  const steps = asArray(path(root, 'PrintProtocol', 'Protocol', 'SubStep'));
  if (!hasToc && steps.length === 0) {
    throw new ProtocolParseError('No PrintTOC or PrintProtocol section found');
  }

  const programs = readPrograms(root);
  const blocks = steps.map((step, i) => readBlock(step, i + 1, convertPhaseEncoding, registry));
  for (const block of blocks) {
    if (block.program !== undefined && !programs.includes(block.program)) {
      programs.push(block.program);
    }
  }
  return {
    headerTitle: textOf(path(root, 'PrintTOC', 'TOC', 'HeaderTitle')),
    programs,
    blocks,
  };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Program names in document order.
 */
export function listSiemensPrograms(
  xml: string,
  registry: ParameterRegistry = getParameterRegistry()
): string[] {
  return readDocument(xml, false, registry).programs;
}

/**
 * Build a protocol from one program of a Siemens printed-protocol export.
 *
 * @throws ProtocolParseError for unreadable XML or a document with no protocol structure
 * @throws ProtocolError (NOT_FOUND) when `programName` is not in the document
 */
export function parseSiemensProtocol(xml: string, options: ProtocolParseOptions = {}): ImagingProtocol {
  const registry = options.registry ?? getParameterRegistry();
  const document = readDocument(xml, options.convertPhaseEncoding ?? true, registry);

  const known = document.programs.length > 0 ? document.programs : [DEFAULT_PROGRAM];
  const programName = options.programName ?? known[0] ?? DEFAULT_PROGRAM;
  if (document.programs.length === 0) {
    log.warn({ program: programName, blocks: document.blocks.length }, 'document names no program');
  }
  if (!known.includes(programName)) {
    throw new ProtocolError(
      'NOT_FOUND',
      `Program '${programName}' not found; available: ${known.join(', ')}`
    );
  }

  const protocol = new ImagingProtocol(options.protocolName ?? programName, {
    category: 'MR',
    registry,
    metadata: {
      vendor: 'Siemens',
      programName,
      ...(document.headerTitle ? { headerTitle: document.headerTitle } : {}),
    },
  });

  for (const block of document.blocks) {
    if (block.program !== undefined && block.program !== programName) continue;
    if (protocol.has(block.name)) {
      log.warn({ sequence: block.name, block: block.index }, 'duplicate sequence block skipped');
      continue;
    }

    const malformed = block.problems.length > 0;
    if (malformed) {
      log.warn({ sequence: block.name, block: block.index, problems: block.problems }, 'malformed sequence block');
    }
    const sequence = ImagingSequence.fromEntries(block.entries, {
      name: block.name,
      registry,
      recognize: !malformed,
      source: {
        type: 'xml',
        program: programName,
        block: block.index,
        ...(block.headerProperty ? { headerProperty: block.headerProperty } : {}),
      },
    });
    protocol.addSequence(block.name, sequence);
  }

  log.info(
    { program: programName, sequences: protocol.size, blocks: document.blocks.length },
    'parsed Siemens protocol'
  );
  return protocol;
}

export const siemensXmlParser: ProtocolParser = {
  parserId: 'siemens_xml',
  aliases: ['siemens', 'siemens_printprotocol'],
  vendor: 'Siemens',
  parse: parseSiemensProtocol,
  listPrograms: (content) => listSiemensPrograms(content),
};

// ============================================================================
// Parser lookup
// ============================================================================

const PARSERS: readonly ProtocolParser[] = [siemensXmlParser];

/**
 * Vendor parsers by id or alias.
 */
export class ProtocolParserRegistry {
  private readonly byId = new Map<string, ProtocolParser>();

  constructor(parsers: readonly ProtocolParser[] = PARSERS) {
    for (const parser of parsers) {
      for (const id of [parser.parserId, ...(parser.aliases ?? [])]) {
        this.byId.set(id, parser);
      }
    }
  }

  /**
   * @throws ProtocolError (UNKNOWN_PARSER) for an id no parser answers to
   */
  resolve(parserId: string): ProtocolParser {
    const parser = this.byId.get(parserId);
    if (!parser) {
      throw new ProtocolError(
        'UNKNOWN_PARSER',
        `Unknown parserId: ${parserId}; known: ${[...this.byId.keys()].join(', ')}`
      );
    }
    return parser;
  }

  list(): Array<Pick<ProtocolParser, 'parserId' | 'vendor'> & { aliases: string[] }> {
    return [...new Set(this.byId.values())].map(({ parserId, vendor, aliases }) => ({
      parserId,
      vendor,
      aliases: aliases ?? [],
    }));
  }
}
