/**
 * QEMU Command Line Rendering
 *
 * Pure functions turning an options snapshot into QEMU arguments.
 */

import {
  ACCELERATION_TOKENS,
  ATTACHMENT_DEVICES,
  type Attachment,
  type OptionsSnapshot,
} from './types.js';

/**
 * Characters that never need shell quoting.
 */
const SHELL_SAFE = /^[A-Za-z0-9_./,:=@%+-]+$/;

/**
 * Escape a value for use inside a QEMU `key=value,...` option string.
 * QEMU reads a doubled comma as a literal comma.
 */
export function escapeQemuOptionValue(value: string): string {
  return value.replace(/,/g, ',,');
}

/**
 * Quote an argument for a POSIX shell.
 *
 * Safe tokens are returned unchanged; anything else is wrapped in single
 * quotes, with embedded single quotes written as '\''.
 */
export function quoteShellArg(arg: string): string {
  if (arg === '') {
    return "''";
  }
  if (SHELL_SAFE.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Order attachments for rendering: boot-ordered ones first by ascending
 * priority, then the rest. Ties fall back to insertion order.
 */
export function orderAttachments(snapshot: OptionsSnapshot): Attachment[] {
  const indexed = snapshot.attachments.map((attachment, index) => ({
    attachment,
    index,
    priority: snapshot.bootOrder.get(attachment.id),
  }));

  indexed.sort((a, b) => {
    if (a.priority !== undefined && b.priority !== undefined) {
      return a.priority - b.priority || a.index - b.index;
    }
    if (a.priority !== undefined) return -1;
    if (b.priority !== undefined) return 1;
    return a.index - b.index;
  });

  return indexed.map((entry) => entry.attachment);
}

/**
 * Build the `-drive` and `-device` arguments for one attachment.
 */
export function buildAttachmentArgs(
  attachment: Attachment,
  bootIndex: number | undefined
): string[] {
  const { media, device } = ATTACHMENT_DEVICES[attachment.kind];

  const driveParameters = [
    `file=${escapeQemuOptionValue(attachment.sourcePath)}`,
    `id=${attachment.id}`,
    `media=${media}`,
    'if=none',
  ];

  const deviceParameters = [device, `drive=${attachment.id}`];
  if (bootIndex !== undefined) {
    deviceParameters.push(`bootindex=${bootIndex}`);
  }

  return ['-drive', driveParameters.join(','), '-device', deviceParameters.join(',')];
}

/**
 * Render a snapshot into an argv array, binary first.
 *
 * Order: binary, `-m`, `-accel`, `-cpu`, `-smp`, then attachments.
 */
export function renderArgs(snapshot: OptionsSnapshot): string[] {
  const args = [snapshot.binary];

  if (snapshot.ram) {
    args.push('-m', `${snapshot.ram.amount}${snapshot.ram.unit}`);
  }

  if (snapshot.acceleration) {
    args.push('-accel', ACCELERATION_TOKENS[snapshot.acceleration]);
  }

  if (snapshot.processor !== undefined) {
    args.push('-cpu', snapshot.processor);
  }

  if (snapshot.cores !== undefined) {
    args.push('-smp', String(snapshot.cores));
  }

  for (const attachment of orderAttachments(snapshot)) {
    args.push(...buildAttachmentArgs(attachment, snapshot.bootOrder.get(attachment.id)));
  }

  return args;
}

/**
 * Render a snapshot into a single shell-ready command line.
 */
export function renderCommandLine(snapshot: OptionsSnapshot): string {
  return renderArgs(snapshot).map(quoteShellArg).join(' ');
}
