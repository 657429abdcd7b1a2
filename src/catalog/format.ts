/**
 * Device Catalog File Format
 *
 * Text serialization of a DeviceCatalog:
 *
 *   # qemucfg device catalog
 *   [Storage devices]
 *     ide-cd<TAB>IDE<TAB><TAB>virtual IDE CD-ROM
 *
 * - `[<class>]` starts a device class.
 * - An entry is two spaces followed by four tab-separated fields:
 *   name, bus, alias, description. Absent fields are empty.
 * - Inside fields, `\` is written `\\`, tab `\t`, newline `\n`, carriage return `\r`.
 * - Lines starting with `#` and blank lines are ignored.
 * - UTF-8, `\n` line endings.
 */

import { readFile } from 'node:fs/promises';

import { ParseError } from '../core/errors.js';
import { DeviceCatalog, type DeviceDescriptor } from './catalog.js';

export const CATALOG_FILE_HEADER = '# qemucfg device catalog';

const ENTRY_INDENT = '  ';
const FIELD_SEPARATOR = '\t';
const FIELD_COUNT = 4;

const ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '\t': '\\t',
  '\n': '\\n',
  '\r': '\\r',
};

const UNESCAPES: Record<string, string> = {
  '\\': '\\',
  t: '\t',
  n: '\n',
  r: '\r',
};

export function escapeField(value: string): string {
  return value.replace(/[\\\t\n\r]/g, (ch) => ESCAPES[ch] ?? ch);
}

/**
 * Reverse escapeField().
 *
 * @throws ParseError on a dangling or unknown escape sequence
 */
export function unescapeField(value: string, lineNumber: number, lineText: string): string {
  let result = '';
  for (let i = 0; i < value.length; i++) {
    const ch = value.charAt(i);
    if (ch !== '\\') {
      result += ch;
      continue;
    }
    const next = value.charAt(i + 1);
    const replacement = UNESCAPES[next];
    if (replacement === undefined) {
      throw new ParseError(`invalid escape sequence "\\${next}"`, lineNumber, lineText);
    }
    result += replacement;
    i++;
  }
  return result;
}

/**
 * Serialize a catalog to the text format described above.
 */
export function serializeCatalog(catalog: DeviceCatalog): string {
  const lines = [CATALOG_FILE_HEADER];

  for (const deviceClass of catalog.classes()) {
    lines.push(`[${escapeField(deviceClass)}]`);
    for (const device of catalog.get(deviceClass)) {
      const fields = [device.name, device.bus, device.alias, device.description].map(
        (field) => escapeField(field ?? '')
      );
      lines.push(`${ENTRY_INDENT}${fields.join(FIELD_SEPARATOR)}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Parse catalog text produced by serializeCatalog().
 *
 * @throws ParseError on an entry outside a class, a wrong field count,
 *   an empty device name or any other unrecognized line
 */
export function parseCatalogText(text: string): DeviceCatalog {
  const catalog = new DeviceCatalog();
  let currentClass: string | undefined;

  for (const [index, line] of text.split('\n').entries()) {
    const lineNumber = index + 1;

    if (line.trim() === '' || line.startsWith('#')) {
      continue;
    }

    if (line.startsWith('[') && line.endsWith(']') && line.length > 2) {
      currentClass = unescapeField(line.slice(1, -1), lineNumber, line);
      catalog.addClass(currentClass);
      continue;
    }

    if (line.startsWith(ENTRY_INDENT)) {
      if (currentClass === undefined) {
        throw new ParseError('device entry before any [class] header', lineNumber, line);
      }
      catalog.addDevice(currentClass, parseEntry(line.slice(ENTRY_INDENT.length), lineNumber, line));
      continue;
    }

    throw new ParseError(`unrecognized catalog line "${line}"`, lineNumber, line);
  }

  return catalog;
}

function parseEntry(entry: string, lineNumber: number, line: string): DeviceDescriptor {
  const fields = entry
    .split(FIELD_SEPARATOR)
    .map((field) => unescapeField(field, lineNumber, line));

  if (fields.length !== FIELD_COUNT) {
    throw new ParseError(
      `expected ${FIELD_COUNT} tab-separated fields, found ${fields.length}`,
      lineNumber,
      line
    );
  }

  const [name = '', bus = '', alias = '', description = ''] = fields;
  if (name === '') {
    throw new ParseError('device entry has an empty name', lineNumber, line);
  }

  return {
    name,
    ...(description !== '' && { description }),
    ...(bus !== '' && { bus }),
    ...(alias !== '' && { alias }),
  };
}

/**
 * Read a catalog file written by DeviceCatalogGenerator.
 */
export async function readDevicesFile(filePath: string): Promise<DeviceCatalog> {
  const content = await readFile(filePath, 'utf-8');
  return parseCatalogText(content);
}
