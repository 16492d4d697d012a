import { describe, expect, it } from "vitest";
import { cleanupName, generateNewFileName, splitExtension } from "./rename-utils.js";

describe("splitExtension", () => {
  it("separa apenas a última extensão", () => {
    expect(splitExtension("archive.tar.gz")).toEqual({
      stem: "archive.tar",
      ext: ".gz",
    });
  });

  it("trata arquivos ocultos como sem extensão", () => {
    expect(splitExtension(".env")).toEqual({ stem: ".env", ext: "" });
  });
});

describe("cleanupName", () => {
  it("junta separadores repetidos e espaços duplos", () => {
    expect(cleanupName("Foo  -  - Bar")).toBe("Foo - Bar");
  });

  it("remove traços, espaços e sublinhados das pontas", () => {
    expect(cleanupName(" - Activate - ")).toBe("Activate");
    expect(cleanupName("_image_")).toBe("image");
  });

  it("mantém sublinhados repetidos do meio do nome", () => {
    expect(cleanupName("a__b")).toBe("a__b");
  });
});

describe("generateNewFileName", () => {
  it("remove o prefixo e mantém a extensão", () => {
    expect(
      generateNewFileName(
        "Unreal Engine 5 C++- Advanced Action RPG - Activate Ability By Tag.mp4",
        "Unreal Engine 5 C++- Advanced Action RPG - "
      )
    ).toBe("Activate Ability By Tag.mp4");
  });

  it("remove todas as ocorrências", () => {
    expect(generateNewFileName("REMOVE REMOVE Song.mp3", "REMOVE")).toBe(
      "Song.mp3"
    );
    expect(generateNewFileName("Foo -  - Bar.txt", " - ")).toBe("FooBar.txt");
  });

  it("não deixa separadores soltos no meio do nome", () => {
    expect(generateNewFileName("Intro - REMOVE - Part 1.txt", "REMOVE")).toBe(
      "Intro - Part 1.txt"
    );
  });

  it("junta sublinhados só onde o texto foi removido", () => {
    expect(generateNewFileName("file_REMOVE_1.txt", "REMOVE")).toBe("file_1.txt");
    expect(generateNewFileName("a__b REMOVE.txt", "REMOVE")).toBe("a__b.txt");
  });

  it("retorna vazio quando não sobra nada do nome", () => {
    expect(generateNewFileName("REMOVE.txt", "REMOVE")).toBe("");
    expect(generateNewFileName(" - REMOVE - .txt", "REMOVE")).toBe("");
  });
});
