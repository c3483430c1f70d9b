import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { RawMessage } from "@list-archive/shared";
import { ArchiveFileError } from "../errors.js";

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export const folderExportSchema = z.object({
  fetched: z.string().optional(),
  folder: z.string().min(1),
  uidvalidity: z.number().int().nonnegative(),
  msgs: z.array(
    z.object({
      uid: z.number().int().nonnegative(),
      msg: z.string().regex(BASE64, "msg must be base64")
    })
  )
});

export const listsFileSchema = z.object({
  fetched: z.string().optional(),
  folders: z.array(z.string().min(1))
});

export type FolderExport = {
  mailingList: string;
  uidvalidity: number;
  fetched: string | null;
  messages: RawMessage[];
};

export function folderExportPath(archiveDir: string, folder: string): string {
  if (folder.includes("/") || folder.includes("\\") || folder === "." || folder === "..") {
    throw new ArchiveFileError({ path: folder, reason: "folder name is not a plain file name" });
  }
  return path.join(archiveDir, "lists", `${folder}.json`);
}

async function readJson(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    throw new ArchiveFileError({
      path: filePath,
      reason: typeof code === "string" ? code : "unreadable",
      cause: error
    });
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new ArchiveFileError({ path: filePath, reason: "not valid JSON", cause: error });
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

export function parseFolderExport(filePath: string, value: unknown): FolderExport {
  const parsed = folderExportSchema.safeParse(value);
  if (!parsed.success) {
    throw new ArchiveFileError({ path: filePath, reason: describeIssues(parsed.error), cause: parsed.error });
  }
  const { folder, uidvalidity, fetched, msgs } = parsed.data;
  return {
    mailingList: folder,
    uidvalidity,
    fetched: fetched ?? null,
    messages: msgs.map((entry) => ({
      mailingList: folder,
      uidvalidity,
      uid: entry.uid,
      raw: new Uint8Array(Buffer.from(entry.msg, "base64"))
    }))
  };
}

export async function readFolderExport(archiveDir: string, folder: string): Promise<FolderExport> {
  const filePath = folderExportPath(archiveDir, folder);
  return parseFolderExport(filePath, await readJson(filePath));
}

export async function readListsFile(filePath: string): Promise<string[]> {
  const parsed = listsFileSchema.safeParse(await readJson(filePath));
  if (!parsed.success) {
    throw new ArchiveFileError({ path: filePath, reason: describeIssues(parsed.error), cause: parsed.error });
  }
  return parsed.data.folders;
}
