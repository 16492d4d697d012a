import fs from "fs/promises";
import path from "path";
import { log } from "./utils.js";

/**
 * Cria uma pasta de exemplo para testar os scripts:
 * arquivos com o texto alvo no primeiro nível, uma subpasta com o texto no nome
 * (com arquivos e outra subpasta dentro) e uma subpasta comum.
 *
 * Retorna os caminhos relativos dos arquivos criados.
 */
export async function generateTestDirectory(
  basePath: string,
  targetStr: string = "REMOVE"
): Promise<string[]> {
  await fs.mkdir(basePath, { recursive: true });
  log("info", `Pasta de teste: ${path.resolve(basePath)}`);

  const layout: Record<string, string[]> = {
    ".": [
      `file_${targetStr}_1.txt`,
      `file_2_${targetStr}.log`,
      `image_${targetStr}.png`,
      `doc_${targetStr}_1.docx`,
    ],
    [`subdir_${targetStr}_A`]: [
      `nested_${targetStr}_1.txt`,
      `nested_2_${targetStr}.txt`,
    ],
    [path.join(`subdir_${targetStr}_A`, `subsub_${targetStr}_B`)]: [
      `file_${targetStr}_x.csv`,
      `another_${targetStr}_y.txt`,
    ],
    subdir_B: ["normal_file.txt", `file_${targetStr}.pdf`],
  };

  const created: string[] = [];
  for (const [dir, files] of Object.entries(layout)) {
    await fs.mkdir(path.join(basePath, dir), { recursive: true });
    for (const fileName of files) {
      const relativePath = path.join(dir, fileName);
      await fs.writeFile(
        path.join(basePath, relativePath),
        `Arquivo de teste: ${fileName}`,
        "utf-8"
      );
      created.push(relativePath);
      log("debug", `Arquivo criado: ${relativePath}`);
    }
  }

  return created;
}
