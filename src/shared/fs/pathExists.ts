import { access } from "fs/promises";

export const isErrnoException = (value: unknown): value is NodeJS.ErrnoException =>
  value instanceof Error && "code" in value;

export const pathExists = async (path: string): Promise<boolean> => {
  try {
    await access(path);
    return true;
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return false;
    throw err;
  }
};
