import fs from "fs/promises";
import path from "path";

export const readText = async (filePath: string) =>
  fs.readFile(filePath, "utf8");

export const writeText = async (filePath: string, content: string) => {
  // Ensure directory exists
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, "utf8");
};

export const readJSON = async (filePath: string): Promise<unknown> => {
  if (!(await fileExists(filePath))) {
    return null;
  }

  const content = await fs.readFile(filePath, "utf8");
  return JSON.parse(content);
};

export const fileExists = async (filePath: string) => {
  return fs
    .access(filePath)
    .then(() => true)
    .catch(() => false);
};
