/**
 * Device File Sink
 *
 * Writes straight to a printer device node (e.g. /dev/usb/lp0) or to a
 * capture file, bypassing any spooler.
 *
 * @module printer/transport/DeviceFileSink
 */

import * as fs from 'fs';
import { ByteSink } from './ByteSink';
import { EscPosErrorCode, SinkError, getErrorMessage } from '../types';
import { environment } from '../../config/environment';
import { debugLogger } from '../../shared/utils/debug-logger';

export interface DeviceFileSinkOptions {
  /** fs open flags (default: 'w') */
  flags?: string;
}

export class DeviceFileSink implements ByteSink {
  private readonly path: string;
  private readonly flags: string;
  private fd: number | null = null;

  constructor(path: string = environment.ESCPOS_DEVICE, options: DeviceFileSinkOptions = {}) {
    this.path = path;
    this.flags = options.flags ?? 'w';
  }

  getPath(): string {
    return this.path;
  }

  isOpen(): boolean {
    return this.fd !== null;
  }

  open(): void {
    if (this.fd !== null) {
      return;
    }

    try {
      this.fd = fs.openSync(this.path, this.flags);
      debugLogger.info(`Opened ${this.path}`, undefined, 'DeviceFileSink');
    } catch (error) {
      throw new SinkError(`Failed to open ${this.path}: ${getErrorMessage(error)}`, error);
    }
  }

  write(data: Buffer): number {
    if (this.fd === null) {
      throw new SinkError(`Device ${this.path} is not open`, undefined, EscPosErrorCode.SINK_NOT_OPEN);
    }

    let written = 0;
    try {
      // writeSync may accept fewer bytes than offered on character devices
      while (written < data.length) {
        written += fs.writeSync(this.fd, data, written, data.length - written);
      }
    } catch (error) {
      throw new SinkError(
        `Write to ${this.path} failed after ${written} of ${data.length} bytes: ${getErrorMessage(error)}`,
        error
      );
    }
    return written;
  }

  close(): void {
    if (this.fd === null) {
      return;
    }

    const fd = this.fd;
    this.fd = null;
    try {
      fs.closeSync(fd);
      debugLogger.info(`Closed ${this.path}`, undefined, 'DeviceFileSink');
    } catch (error) {
      throw new SinkError(`Failed to close ${this.path}: ${getErrorMessage(error)}`, error);
    }
  }
}
