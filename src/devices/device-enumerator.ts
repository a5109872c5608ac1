import { access, readdir } from "node:fs/promises";
import path from "node:path";

/** Source of host device paths. Injected so the policy is testable without hardware. */
export interface DeviceEnumerator {
  serialPorts(): Promise<string[]>;
  videoDevices(): Promise<string[]>;
  exists(devicePath: string): Promise<boolean>;
}

/** USB serial adapters: Linux ttyUSB/ttyACM, macOS usbmodem/usbserial. */
const SERIAL_RE = /^(ttyUSB\d+|ttyACM\d+|(tty|cu)\.(usbmodem|usbserial)\S*)$/;
const VIDEO_RE = /^video\d+$/;

/** Enumerates devices by listing a /dev directory. */
export class DevDirectoryEnumerator implements DeviceEnumerator {
  constructor(private readonly devDir = "/dev") {}

  async serialPorts(): Promise<string[]> {
    return this.match(SERIAL_RE);
  }

  async videoDevices(): Promise<string[]> {
    return this.match(VIDEO_RE);
  }

  async exists(devicePath: string): Promise<boolean> {
    try {
      await access(devicePath);
      return true;
    } catch {
      return false;
    }
  }

  private async match(re: RegExp): Promise<string[]> {
    const entries = await readdir(this.devDir);
    return entries
      .filter((name) => re.test(name))
      .sort(naturalCompare)
      .map((name) => path.join(this.devDir, name));
  }
}

/** ttyUSB2 before ttyUSB10. */
function naturalCompare(a: string, b: string): number {
  return a.localeCompare(b, undefined, { numeric: true });
}
