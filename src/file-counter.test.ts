import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  countFiles,
  formatSize,
  formatTypeChart,
  formatTypeList,
  getFileExtension,
} from "./file-counter.js";
import { generateTestDirectory } from "./test-directory.js";

describe("getFileExtension", () => {
  it("devolve a extensão em minúsculas", () => {
    expect(getFileExtension("Video.MP4")).toBe(".mp4");
  });

  it("usa o rótulo quando não há extensão", () => {
    expect(getFileExtension("README")).toBe("sem extensão");
    expect(getFileExtension(".env")).toBe("sem extensão");
  });
});

describe("formatSize", () => {
  it("formata com a maior unidade possível", () => {
    expect(formatSize(0)).toBe("0 B");
    expect(formatSize(500)).toBe("500.0 B");
    expect(formatSize(1536)).toBe("1.5 KB");
    expect(formatSize(1024 * 1024)).toBe("1.0 MB");
  });
});

describe("formatTypeChart", () => {
  it("ordena por quantidade e escala as barras pelo maior tipo", () => {
    expect(formatTypeChart({ ".png": 1, ".txt": 2 }, 3)).toEqual([
      "📊 Distribuição por tipo:",
      "=".repeat(60),
      `.txt            | ${"█".repeat(40)}    2 ( 66.7%)`,
      `.png            | ${"█".repeat(20)}    1 ( 33.3%)`,
      "=".repeat(60),
    ]);
  });

  it("não gera nada sem arquivos", () => {
    expect(formatTypeChart({}, 0)).toEqual([]);
  });
});

describe("formatTypeList", () => {
  it("desempata pela extensão", () => {
    expect(formatTypeList({ ".b": 1, ".a": 1 }, 2)).toEqual([
      "Distribuição por tipo:",
      "  .a: 1 arquivo(s) (50.0%)",
      "  .b: 1 arquivo(s) (50.0%)",
    ]);
  });
});

describe("countFiles", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "file-tools-counter-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("conta só o primeiro nível da pasta", async () => {
    await fs.writeFile(path.join(tmpDir, "a.txt"), "hello");
    await fs.writeFile(path.join(tmpDir, "b.TXT"), "abc");
    await fs.writeFile(path.join(tmpDir, "c.png"), "");
    await fs.mkdir(path.join(tmpDir, "sub"));
    await fs.writeFile(path.join(tmpDir, "sub", "d.txt"), "ignorado");

    await expect(countFiles(tmpDir)).resolves.toEqual({
      fileCount: 3,
      dirCount: 1,
      fileTypes: { ".txt": 2, ".png": 1 },
      totalSize: 8,
    });
  });

  it("conta a pasta de teste gerada", async () => {
    await generateTestDirectory(tmpDir);

    const result = await countFiles(tmpDir);

    expect(result.fileCount).toBe(4);
    expect(result.dirCount).toBe(2);
    expect(result.fileTypes).toEqual({
      ".docx": 1,
      ".log": 1,
      ".png": 1,
      ".txt": 1,
    });
  });

  it("falha quando o diretório não existe", async () => {
    await expect(countFiles(path.join(tmpDir, "nao-existe"))).rejects.toMatchObject({
      kind: "DirectoryNotFound",
    });
  });

  it("falha quando o caminho é um arquivo", async () => {
    const filePath = path.join(tmpDir, "a.txt");
    await fs.writeFile(filePath, "hello");

    await expect(countFiles(filePath)).rejects.toMatchObject({
      kind: "DirectoryNotFound",
      message: `O caminho não é um diretório: ${filePath}`,
    });
  });
});
