/**
 * Device Listing Parser
 *
 * Parses the output of `qemu-system-* -device help`:
 *
 *   Storage devices:
 *   name "ide-cd", bus IDE, desc "virtual IDE CD-ROM"
 *   name "ide-hd", bus IDE, desc "virtual IDE disk"
 *
 *   USB devices:
 *   name "usb-tablet", bus usb-bus
 *
 * Parsing is strict: anything that is not blank, a section header or a
 * device line raises ParseError, and so does a device line before the
 * first header.
 */

import { ParseError } from '../core/errors.js';
import { DeviceCatalog, type DeviceDescriptor } from './catalog.js';

/**
 * Classification of a single output line
 */
export type DeviceHelpLine =
  | { type: 'blank' }
  | { type: 'header'; deviceClass: string }
  | { type: 'device'; properties: string }
  | { type: 'unrecognized' };

/**
 * Parser state: outside any section, or collecting devices of one class
 */
export type ParserState =
  | { kind: 'outside-section' }
  | { kind: 'in-section'; deviceClass: string };

const DEVICE_LINE_PREFIX = 'name ';
const PROPERTY_KEY = /^[A-Za-z][A-Za-z0-9_-]*$/;

/**
 * Classify one line of `-device help` output.
 */
export function classifyLine(line: string): DeviceHelpLine {
  const trimmed = line.trim();

  if (trimmed === '') {
    return { type: 'blank' };
  }
  if (trimmed.startsWith(DEVICE_LINE_PREFIX)) {
    return { type: 'device', properties: trimmed };
  }
  if (trimmed.length > 1 && trimmed.endsWith(':')) {
    return { type: 'header', deviceClass: trimmed.slice(0, -1).trim() };
  }
  return { type: 'unrecognized' };
}

/**
 * Split a property list such as `name "e1000", bus PCI, desc "Intel Gigabit Ethernet"`
 * into key/value pairs. Quoted values may contain commas.
 *
 * @param text - Property list
 * @param lineNumber - 1-based line number, for error reporting
 */
export function parsePropertyList(text: string, lineNumber: number): Map<string, string> {
  const properties = new Map<string, string>();
  const error = (message: string): ParseError => new ParseError(message, lineNumber, text);

  let i = 0;
  while (i < text.length) {
    const space = text.indexOf(' ', i);
    if (space === -1) {
      throw error(`expected "<key> <value>" at column ${i + 1}`);
    }
    const key = text.slice(i, space);
    if (!PROPERTY_KEY.test(key)) {
      throw error(`invalid property key "${key}"`);
    }
    i = space + 1;

    let value: string;
    if (text[i] === '"') {
      const closing = text.indexOf('"', i + 1);
      if (closing === -1) {
        throw error(`unterminated quoted value for "${key}"`);
      }
      value = text.slice(i + 1, closing);
      i = closing + 1;
    } else {
      const comma = text.indexOf(',', i);
      const end = comma === -1 ? text.length : comma;
      value = text.slice(i, end).trim();
      i = end;
    }

    if (properties.has(key)) {
      throw error(`duplicate property "${key}"`);
    }
    properties.set(key, value);

    if (i < text.length) {
      const separator = /^\s*,\s*/.exec(text.slice(i));
      if (!separator) {
        throw error(`expected "," after "${key}" value`);
      }
      i += separator[0].length;
    }
  }

  return properties;
}

/**
 * Parse one device line into a descriptor.
 *
 * Recognized keys are `name`, `bus`, `desc` and `alias`; empty values count
 * as absent.
 */
export function parseDeviceLine(text: string, lineNumber: number): DeviceDescriptor {
  let name: string | undefined;
  let bus: string | undefined;
  let description: string | undefined;
  let alias: string | undefined;

  for (const [key, rawValue] of parsePropertyList(text, lineNumber)) {
    const value = rawValue === '' ? undefined : rawValue;
    switch (key) {
      case 'name':
        name = value;
        break;
      case 'bus':
        bus = value;
        break;
      case 'desc':
        description = value;
        break;
      case 'alias':
        alias = value;
        break;
      default:
        throw new ParseError(`unknown device property "${key}"`, lineNumber, text);
    }
  }

  if (name === undefined) {
    throw new ParseError('device line has no name', lineNumber, text);
  }

  return {
    name,
    ...(description !== undefined && { description }),
    ...(bus !== undefined && { bus }),
    ...(alias !== undefined && { alias }),
  };
}

/**
 * Parse complete `-device help` output into a catalog.
 *
 * Blank lines do not end a section: every device line belongs to the most
 * recent header.
 *
 * @throws ParseError on the first malformed line, or when the output has no
 *   section header at all
 */
export function parseDeviceHelp(output: string): DeviceCatalog {
  const catalog = new DeviceCatalog();
  const lines = output.split(/\r?\n/);
  let state: ParserState = { kind: 'outside-section' };

  for (const [index, line] of lines.entries()) {
    const lineNumber = index + 1;
    const classified = classifyLine(line);

    switch (classified.type) {
      case 'blank':
        break;
      case 'header':
        catalog.addClass(classified.deviceClass);
        state = { kind: 'in-section', deviceClass: classified.deviceClass };
        break;
      case 'device':
        if (state.kind === 'outside-section') {
          throw new ParseError('device listed before any section header', lineNumber, line);
        }
        catalog.addDevice(state.deviceClass, parseDeviceLine(classified.properties, lineNumber));
        break;
      case 'unrecognized':
        throw new ParseError(`unrecognized line "${line.trim()}"`, lineNumber, line);
    }
  }

  if (catalog.size === 0) {
    throw new ParseError('no device sections found', 1, lines[0] ?? '');
  }

  return catalog;
}
