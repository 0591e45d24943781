import fs from "node:fs/promises";
import path from "node:path";
import { createHash } from "node:crypto";
import type { FileRef, FileType } from "../codec/message.js";
import { AttachmentRejectedError, StorageReadError, StorageWriteError } from "../errors.js";
import type { StorageBackend } from "./backend.js";
import { FILES_PREFIX, IMAGES_PREFIX, formatStamp, joinKey } from "./layout.js";

export const MAX_ATTACHMENT_BYTES = 50 * 1024 * 1024;

const IMAGE_TYPES: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
  ".bmp": "image/bmp",
  ".webp": "image/webp",
};

const FILE_TYPES: Record<string, string> = {
  ".txt": "text/plain",
  ".doc": "application/msword",
  ".docx": "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  ".pdf": "application/pdf",
  ".xls": "application/vnd.ms-excel",
  ".xlsx": "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  ".ppt": "application/vnd.ms-powerpoint",
  ".pptx": "application/vnd.openxmlformats-officedocument.presentationml.presentation",
  ".zip": "application/zip",
  ".rar": "application/vnd.rar",
  ".7z": "application/x-7z-compressed",
  ".tar": "application/x-tar",
  ".gz": "application/gzip",
  ".mp3": "audio/mpeg",
  ".mp4": "video/mp4",
  ".avi": "video/x-msvideo",
  ".mov": "video/quicktime",
};

function classify(ext: string): { fileType: FileType; mimeType: string } | null {
  const image = IMAGE_TYPES[ext];
  if (image) return { fileType: "image", mimeType: image };
  const file = FILE_TYPES[ext];
  if (file) return { fileType: "file", mimeType: file };
  return null;
}

/** Copies local files into `files/` or `images/` next to the messages that reference them. */
export class AttachmentStore {
  constructor(
    private readonly backend: StorageBackend,
    private readonly clock: () => number = Date.now,
  ) {}

  async upload(localPath: string, uploaderId: string, uploaderName: string): Promise<FileRef> {
    const ext = path.extname(localPath).toLowerCase();
    const kind = classify(ext);
    if (!kind) throw new AttachmentRejectedError(`Unsupported file type: ${ext || "(none)"}`);

    const data = await fs.readFile(localPath);
    if (data.length > MAX_ATTACHMENT_BYTES) {
      throw new AttachmentRejectedError(`File too large: ${(data.length / 1024 / 1024).toFixed(1)}MB`);
    }

    const fileHash = createHash("md5").update(data).digest("hex");
    const now = this.clock();
    const filename = `${formatStamp(now).slice(0, 15)}_${uploaderId}_${fileHash.slice(0, 8)}${ext}`;
    const key = joinKey(kind.fileType === "image" ? IMAGES_PREFIX : FILES_PREFIX, filename);
    try {
      await this.backend.put(key, data);
    } catch (e) {
      throw new StorageWriteError(key, e);
    }

    return {
      filename,
      originalName: path.basename(localPath),
      fileType: kind.fileType,
      fileSize: data.length,
      fileHash,
      mimeType: kind.mimeType,
      uploadTime: new Date(now).toISOString(),
      uploaderId,
      uploaderName,
      relativePath: key,
    };
  }

  /** Writes the attachment into `destDir` under its original name and returns the path. */
  async download(ref: FileRef, destDir: string): Promise<string> {
    let data: Buffer;
    try {
      data = await this.backend.get(ref.relativePath);
    } catch (e) {
      throw new StorageReadError(ref.relativePath, e);
    }
    await fs.mkdir(destDir, { recursive: true });
    const target = path.join(destDir, path.basename(ref.originalName));
    await fs.writeFile(target, data);
    return target;
  }
}
