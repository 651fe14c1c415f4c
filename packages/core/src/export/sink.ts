import { writeFile } from "node:fs/promises";
import type { Writable } from "node:stream";
import { ExportIoError, errorMessage } from "./errors.js";

/** A destination file path, or an open stream the caller owns. */
export type ExportSink = string | Writable;

function describeSink(sink: ExportSink): string {
  return typeof sink === "string" ? sink : "<stream>";
}

/**
 * A stream reports failures on its 'error' event as well as (sometimes) the
 * write callback. Both paths reject; the listener stays attached after a
 * failed write because the event follows the callback.
 */
function writeToStream(stream: Writable, data: Buffer): Promise<void> {
  if (!stream.writable) {
    return Promise.reject(new Error("stream is ended or destroyed"));
  }
  return new Promise((resolve, reject) => {
    const onError = (err: Error): void => reject(err);
    stream.once("error", onError);
    stream.write(data, (err) => {
      if (err) {
        reject(err);
        return;
      }
      stream.off("error", onError);
      resolve();
    });
  });
}

/**
 * Write a finished document in one go. Files are opened and closed by
 * `writeFile`; streams are written but left open for the caller.
 */
export async function writeToSink(
  sink: ExportSink,
  data: Buffer,
): Promise<void> {
  try {
    if (typeof sink === "string") {
      await writeFile(sink, data);
    } else {
      await writeToStream(sink, data);
    }
  } catch (err) {
    throw new ExportIoError(
      `Failed to write ${describeSink(sink)}: ${errorMessage(err)}`,
      { sink: describeSink(sink) },
    );
  }
}
