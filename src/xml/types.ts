import type { ImagingProtocol } from '../protocol/ImagingProtocol.js';
import type { ParameterRegistry } from '../registry/ParameterRegistry.js';

export type ProtocolParseOptions = {
  /** Program to build the protocol from; defaults to the first one listed */
  programName?: string | undefined;
  /** Rewrite A >> P / R >> L style phase directions as COL / ROW (default true) */
  convertPhaseEncoding?: boolean | undefined;
  registry?: ParameterRegistry | undefined;
  /** Protocol name; defaults to the program name */
  protocolName?: string | undefined;
};

export type ProtocolParser = {
  parserId: string;
  aliases?: string[];
  vendor: string;
  parse: (content: string, options?: ProtocolParseOptions) => ImagingProtocol;
  listPrograms: (content: string) => string[];
};
