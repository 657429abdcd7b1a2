/**
 * Device Catalog
 *
 * In-memory listing of QEMU device classes and the devices in each.
 */

/**
 * One device from `-device help`
 */
export interface DeviceDescriptor {
  /** Identifier accepted by `-device` */
  readonly name: string;
  readonly description?: string;
  /** Bus the device plugs into (e.g. `PCI`, `usb-bus`) */
  readonly bus?: string;
  /** Alternative identifier QEMU accepts for the same device */
  readonly alias?: string;
}

/**
 * JSON form of a catalog: class name -> devices, in catalog order
 */
export type DeviceCatalogJson = Record<string, DeviceDescriptor[]>;

/**
 * Ordered mapping from device class (e.g. `Storage devices`) to its devices.
 */
export class DeviceCatalog {
  private readonly sections = new Map<string, DeviceDescriptor[]>();

  /**
   * Register a device class. Adding an existing class keeps its devices.
   */
  addClass(deviceClass: string): void {
    if (!this.sections.has(deviceClass)) {
      this.sections.set(deviceClass, []);
    }
  }

  /**
   * Append a device to a class, registering the class if needed.
   */
  addDevice(deviceClass: string, device: DeviceDescriptor): void {
    this.addClass(deviceClass);
    this.sections.get(deviceClass)?.push(Object.freeze({ ...device }));
  }

  /**
   * Device class names in the order they were added.
   */
  classes(): string[] {
    return [...this.sections.keys()];
  }

  has(deviceClass: string): boolean {
    return this.sections.has(deviceClass);
  }

  /**
   * Devices of a class, or an empty list for an unknown class.
   */
  get(deviceClass: string): readonly DeviceDescriptor[] {
    return [...(this.sections.get(deviceClass) ?? [])];
  }

  /**
   * Find a device by name or alias across all classes.
   */
  find(name: string): { deviceClass: string; device: DeviceDescriptor } | undefined {
    for (const [deviceClass, devices] of this.sections) {
      const device = devices.find((d) => d.name === name || d.alias === name);
      if (device) {
        return { deviceClass, device };
      }
    }
    return undefined;
  }

  /**
   * Distinct bus names, sorted.
   */
  buses(): string[] {
    const buses = new Set<string>();
    for (const devices of this.sections.values()) {
      for (const device of devices) {
        if (device.bus !== undefined) {
          buses.add(device.bus);
        }
      }
    }
    return [...buses].sort();
  }

  /** Number of device classes */
  get size(): number {
    return this.sections.size;
  }

  /** Number of devices across all classes */
  get deviceCount(): number {
    let count = 0;
    for (const devices of this.sections.values()) {
      count += devices.length;
    }
    return count;
  }

  toJSON(): DeviceCatalogJson {
    const json: DeviceCatalogJson = {};
    for (const [deviceClass, devices] of this.sections) {
      json[deviceClass] = devices.map((device) => ({ ...device }));
    }
    return json;
  }
}
