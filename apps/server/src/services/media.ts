import fs from "node:fs";
import path from "node:path";

export interface ResolvedMedia {
  fileName: string;
  filePath: string;
}

const TRAILING_INDEX = /-\d+$/;

function stem(fileName: string): string {
  return fileName.slice(0, fileName.length - path.extname(fileName).length);
}

function pickCandidate(token: string, fileNames: readonly string[]): string | undefined {
  const matches = fileNames
    .filter((name) => !name.toLowerCase().endsWith(".html") && name.includes(token))
    .sort();
  return matches.find((name) => stem(name).endsWith(token)) ?? matches[0];
}

export function attachmentToken(reference: string): string {
  const tokens = reference.split(" ").filter(Boolean);
  return tokens[tokens.length - 1] ?? "";
}

export function resolveAttachment(reference: string, fileNames: readonly string[]): string | undefined {
  const token = attachmentToken(reference);
  if (!token) {
    return undefined;
  }

  const found = pickCandidate(token, fileNames);
  if (found) {
    return found;
  }

  const shortened = token.replace(TRAILING_INDEX, "");
  if (shortened === token || !shortened) {
    return undefined;
  }
  return pickCandidate(shortened, fileNames);
}

export class MediaDirectory {
  private readonly fileNames: string[];

  constructor(private readonly directory: string) {
    this.fileNames = fs
      .readdirSync(directory, { withFileTypes: true })
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  }

  resolve(reference: string): ResolvedMedia | undefined {
    const fileName = resolveAttachment(reference, this.fileNames);
    return fileName ? { fileName, filePath: path.join(this.directory, fileName) } : undefined;
  }

  read(media: ResolvedMedia): Buffer {
    return fs.readFileSync(media.filePath);
  }
}
