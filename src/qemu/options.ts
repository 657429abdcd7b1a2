/**
 * QEMU Options Model
 *
 * Accumulates the VM hardware description and renders it into a QEMU
 * invocation. All validation happens at the call that supplies the value;
 * rendering never mutates state.
 */

import { InvalidArgumentError, UnknownAttachmentError } from '../core/errors.js';
import { renderArgs, renderCommandLine } from './render.js';
import {
  isAccelerationMode,
  type AccelerationMode,
  type Attachment,
  type AttachmentKind,
  type OptionsSnapshot,
  type RamSize,
  type RamUnit,
} from './types.js';

/**
 * Default QEMU system emulator
 */
export const DEFAULT_QEMU_BINARY = 'qemu-system-x86_64';

const DRIVE_ID_PREFIX = 'drive_';

function requirePositiveInteger(value: number, argument: string): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidArgumentError(
      `${argument} must be a positive integer, got ${value}`,
      argument
    );
  }
}

function requireNonEmpty(value: string, argument: string): void {
  if (typeof value !== 'string' || value.length === 0) {
    throw new InvalidArgumentError(`${argument} must be a non-empty string`, argument);
  }
}

/**
 * Mutable builder for a QEMU command line.
 *
 * @example
 * const options = new QemuOptions('/usr/bin/qemu-system-x86_64');
 * const cd = options.addCdrom('/iso/install.iso');
 * options.setRamMegabytes(4096).setBootOrder(cd, 0);
 * options.toCommandLine();
 * // /usr/bin/qemu-system-x86_64 -m 4096M -drive file=/iso/install.iso,id=drive_0,... -device ide-cd,drive=drive_0,bootindex=0
 */
export class QemuOptions {
  private readonly binary: string;
  private readonly attachments: Attachment[] = [];
  private readonly bootOrder = new Map<string, number>();
  private nextDriveNumber = 0;
  private ram: RamSize | undefined;
  private acceleration: AccelerationMode | undefined;
  private processor: string | undefined;
  private cores: number | undefined;

  constructor(binary: string = DEFAULT_QEMU_BINARY) {
    requireNonEmpty(binary, 'binary');
    this.binary = binary;
  }

  /**
   * Attach an ISO image as a CD-ROM.
   *
   * @returns Attachment id for use with setBootOrder()
   */
  addCdrom(path: string): string {
    return this.attach('cdrom', path);
  }

  /**
   * Attach a disk image as a hard drive.
   *
   * @returns Attachment id for use with setBootOrder()
   */
  addHardDrive(path: string): string {
    return this.attach('hard-drive', path);
  }

  /**
   * Set the boot priority of an attachment. Lower boots first; the last
   * call for an id wins.
   *
   * @throws UnknownAttachmentError if the id was not issued by this instance
   */
  setBootOrder(id: string, priority: number): this {
    this.requireAttachment(id);
    if (!Number.isSafeInteger(priority) || priority < 0) {
      throw new InvalidArgumentError(
        `priority must be a non-negative integer, got ${priority}`,
        'priority'
      );
    }
    this.bootOrder.set(id, priority);
    return this;
  }

  /**
   * Remove the boot priority of an attachment.
   */
  clearBootOrder(id: string): this {
    this.requireAttachment(id);
    this.bootOrder.delete(id);
    return this;
  }

  setAccelerationMode(mode: AccelerationMode): this {
    if (!isAccelerationMode(mode)) {
      throw new InvalidArgumentError(`Unknown acceleration mode: ${String(mode)}`, 'mode');
    }
    this.acceleration = mode;
    return this;
  }

  setRamMegabytes(megabytes: number): this {
    return this.setRam(megabytes, 'M', 'megabytes');
  }

  setRamGigabytes(gigabytes: number): this {
    return this.setRam(gigabytes, 'G', 'gigabytes');
  }

  setCoresCount(cores: number): this {
    requirePositiveInteger(cores, 'cores');
    this.cores = cores;
    return this;
  }

  /**
   * Set the CPU model passed to `-cpu` (e.g. `host`, `qemu64`).
   */
  setProcessor(model: string): this {
    requireNonEmpty(model, 'model');
    this.processor = model;
    return this;
  }

  getAttachments(): readonly Attachment[] {
    return [...this.attachments];
  }

  getBootPriority(id: string): number | undefined {
    return this.bootOrder.get(id);
  }

  /**
   * Capture the current state as a frozen snapshot.
   */
  snapshot(): OptionsSnapshot {
    return Object.freeze({
      binary: this.binary,
      ram: this.ram,
      acceleration: this.acceleration,
      processor: this.processor,
      cores: this.cores,
      attachments: Object.freeze([...this.attachments]),
      bootOrder: new Map(this.bootOrder),
    });
  }

  /**
   * Render the argv array, binary first. Suitable for spawn() as-is.
   */
  toArgs(): string[] {
    return renderArgs(this.snapshot());
  }

  /**
   * Render a single shell-ready command line.
   *
   * Tokens containing shell metacharacters (spaces, quotes, ...) are
   * single-quoted; plain paths are emitted verbatim.
   */
  toCommandLine(): string {
    return renderCommandLine(this.snapshot());
  }

  private attach(kind: AttachmentKind, path: string): string {
    requireNonEmpty(path, 'path');
    const attachment: Attachment = Object.freeze({
      id: `${DRIVE_ID_PREFIX}${this.nextDriveNumber}`,
      kind,
      sourcePath: path,
    });
    this.nextDriveNumber++;
    this.attachments.push(attachment);
    return attachment.id;
  }

  private requireAttachment(id: string): void {
    if (!this.attachments.some((attachment) => attachment.id === id)) {
      throw new UnknownAttachmentError(id);
    }
  }

  private setRam(amount: number, unit: RamUnit, argument: string): this {
    requirePositiveInteger(amount, argument);
    this.ram = { amount, unit };
    return this;
  }
}
