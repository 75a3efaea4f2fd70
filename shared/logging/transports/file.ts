/**
 * File Transport
 *
 * Appends JSON lines (or plain text) to one file per day, rotating by size.
 */

import * as fs from "fs";
import * as path from "path";
import type { LogTransport, LogEntry, LogLevel } from "../types.js";

// ============================================
// FILE TRANSPORT
// ============================================

export interface FileTransportOptions {
  minLevel?: LogLevel;
  logDir: string;
  /** Base filename (default: "tickcall") */
  filename?: string;
  /** Max file size in bytes before rotation (default: 10MB) */
  maxSize?: number;
  /** Max number of rotated files to keep (default: 5) */
  maxFiles?: number;
  /** Write as JSON lines (default: true) */
  jsonFormat?: boolean;
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  private logDir: string;
  private filename: string;
  private maxSize: number;
  private maxFiles: number;
  private jsonFormat: boolean;
  private currentPath: string;
  private writeStream: fs.WriteStream | null = null;
  private currentSize = 0;
  private writeQueue: string[] = [];
  private isWriting = false;
  private idleWaiters: (() => void)[] = [];

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel ?? "info";
    this.logDir = options.logDir;
    this.filename = options.filename ?? "tickcall";
    this.maxSize = options.maxSize ?? 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 5;
    this.jsonFormat = options.jsonFormat ?? true;

    fs.mkdirSync(this.logDir, { recursive: true });
    this.currentPath = this.getLogPath();
    this.openStream();
  }

  private getLogPath(): string {
    const date = new Date().toISOString().slice(0, 10); // YYYY-MM-DD
    return path.join(this.logDir, `${this.filename}-${date}.log`);
  }

  private openStream(): fs.WriteStream {
    this.currentPath = this.getLogPath();

    try {
      this.currentSize = fs.statSync(this.currentPath).size;
    } catch {
      this.currentSize = 0;
    }

    const stream = fs.createWriteStream(this.currentPath, { flags: "a" });
    stream.on("error", (err: Error) => {
      console.error("[FileTransport] Write error:", err);
    });
    this.writeStream = stream;
    return stream;
  }

  log(entry: LogEntry): void {
    const line = (this.jsonFormat ? JSON.stringify(entry) : formatPlainText(entry)) + "\n";
    this.writeQueue.push(line);
    this.processQueue();
  }

  private processQueue(): void {
    if (this.isWriting) return;

    const stream = this.writeStream;
    const line = this.writeQueue.shift();
    if (line === undefined || !stream) {
      // Nothing left, or closed: whatever is queued is dropped
      this.writeQueue = [];
      this.notifyIdle();
      return;
    }

    this.isWriting = true;
    const bytes = Buffer.byteLength(line);

    let target = stream;
    try {
      if (this.currentSize + bytes > this.maxSize) {
        target = this.rotate();
      } else if (this.getLogPath() !== this.currentPath) {
        // New day, new file
        stream.end();
        target = this.openStream();
      }
    } catch (err) {
      console.error("[FileTransport] Rotation failed:", err);
      // Keep appending to the current file
      target = this.writeStream && !this.writeStream.writableEnded ? this.writeStream : this.openStream();
    }

    target.write(line, (err: Error | null | undefined) => {
      if (!err) {
        this.currentSize += bytes;
      }
      this.isWriting = false;
      this.processQueue();
    });
  }

  private rotate(): fs.WriteStream {
    this.writeStream?.end();

    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const oldPath = `${this.currentPath}.${i}`;
      if (!fs.existsSync(oldPath)) continue;
      if (i === this.maxFiles - 1) {
        fs.unlinkSync(oldPath);
      } else {
        fs.renameSync(oldPath, `${this.currentPath}.${i + 1}`);
      }
    }

    if (fs.existsSync(this.currentPath)) {
      fs.renameSync(this.currentPath, `${this.currentPath}.1`);
    }

    return this.openStream();
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  async flush(): Promise<void> {
    if (!this.isWriting && this.writeQueue.length === 0) return;
    await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  async close(): Promise<void> {
    await this.flush();
    const stream = this.writeStream;
    this.writeStream = null;
    if (!stream) return;
    await new Promise<void>((resolve) => stream.end(() => resolve()));
  }
}

function formatPlainText(entry: LogEntry): string {
  const parts = [
    entry.timestamp,
    entry.level.toUpperCase().padEnd(5),
    `[${entry.component}]`,
    entry.message,
  ];

  if (entry.taskId) parts.push(`task=${entry.taskId}`);
  if (entry.data) parts.push(JSON.stringify(entry.data));

  if (entry.error) {
    parts.push(`ERROR: ${entry.error.name}: ${entry.error.message}`);
    if (entry.error.stack) parts.push(entry.error.stack);
  }

  return parts.join(" ");
}
