/**
 * QEMU Types
 *
 * Type definitions and fixed lookup tables for building QEMU invocations.
 */

/**
 * Hardware-virtualization backends accepted by `-accel`
 */
export type AccelerationMode =
  | 'kvm'
  | 'xen'
  | 'hax'
  | 'hvf'
  | 'nvmm'
  | 'whpx'
  | 'tcg';

/**
 * Acceleration mode -> `-accel` token.
 *
 * Adding a mode means adding it to AccelerationMode and to this table.
 */
export const ACCELERATION_TOKENS: Readonly<Record<AccelerationMode, string>> = {
  kvm: 'kvm',
  xen: 'xen',
  hax: 'hax',
  hvf: 'hvf',
  nvmm: 'nvmm',
  whpx: 'whpx',
  tcg: 'tcg',
};

/**
 * Check whether a string names a known acceleration mode.
 */
export function isAccelerationMode(value: string): value is AccelerationMode {
  return Object.prototype.hasOwnProperty.call(ACCELERATION_TOKENS, value);
}

/**
 * Kinds of media that can be attached to the VM
 */
export type AttachmentKind = 'cdrom' | 'hard-drive';

/**
 * How an attachment kind is spelled on the QEMU command line
 */
export interface AttachmentDevice {
  /** Value of `media=` on the `-drive` option */
  media: 'cdrom' | 'disk';
  /** Device model passed to `-device` */
  device: string;
}

/**
 * Attachment kind -> `-drive` media and `-device` model.
 */
export const ATTACHMENT_DEVICES: Readonly<Record<AttachmentKind, AttachmentDevice>> = {
  cdrom: { media: 'cdrom', device: 'ide-cd' },
  'hard-drive': { media: 'disk', device: 'ide-hd' },
};

/**
 * A CD-ROM or hard drive attached to the VM
 */
export interface Attachment {
  /** Handle issued by the options instance, also used as the QEMU drive id */
  readonly id: string;
  readonly kind: AttachmentKind;
  /** Image path exactly as the caller passed it */
  readonly sourcePath: string;
}

/**
 * Unit suffix understood by `-m`
 */
export type RamUnit = 'M' | 'G';

/**
 * Guest memory size
 */
export interface RamSize {
  readonly amount: number;
  readonly unit: RamUnit;
}

/**
 * Read-only view of an options instance, consumed by the renderer
 */
export interface OptionsSnapshot {
  /** QEMU system emulator binary */
  readonly binary: string;
  readonly ram?: RamSize;
  readonly acceleration?: AccelerationMode;
  /** CPU model for `-cpu` */
  readonly processor?: string;
  /** Core count for `-smp` */
  readonly cores?: number;
  /** Attachments in insertion order */
  readonly attachments: readonly Attachment[];
  /** Attachment id -> boot priority (lower boots first) */
  readonly bootOrder: ReadonlyMap<string, number>;
}
