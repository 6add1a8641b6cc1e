import fs from "fs";

export function loadDictionary(filePath: string): Set<string> {
  if (!fs.existsSync(filePath)) {
    console.error("Dictionary file not found at", filePath);
    return new Set();
  }
  try {
    const raw = fs.readFileSync(filePath, "utf8");
    return new Set(
      raw
        .split(/\r?\n/)
        .map((word) => word.trim().toUpperCase())
        .filter(Boolean)
    );
  } catch (error) {
    console.error("Failed to load dictionary file.", error);
    return new Set();
  }
}
