import { describe, expect, it } from "vitest";
import { FileToolError, fromFsError, kindFromFsError } from "./errors.js";

function fsError(code: string): Error {
  return Object.assign(new Error(`${code}: falha`), { code });
}

describe("kindFromFsError", () => {
  it.each([
    ["ENOENT", "DirectoryNotFound"],
    ["ENOTDIR", "DirectoryNotFound"],
    ["EACCES", "PermissionDenied"],
    ["EPERM", "PermissionDenied"],
    ["EEXIST", "NameConflict"],
    ["EIO", "Unknown"],
  ])("%s → %s", (code, kind) => {
    expect(kindFromFsError(fsError(code))).toBe(kind);
  });

  it("trata valores que não são erros como desconhecidos", () => {
    expect(kindFromFsError("falhou")).toBe("Unknown");
  });
});

describe("fromFsError", () => {
  it("monta a mensagem pelo tipo do erro", () => {
    const error = fromFsError(fsError("EACCES"), "/tmp/pasta");

    expect(error).toBeInstanceOf(FileToolError);
    expect(error.kind).toBe("PermissionDenied");
    expect(error.message).toBe("Sem permissão para acessar: /tmp/pasta");
  });

  it("mantém erros já convertidos", () => {
    const original = new FileToolError("InvalidArgument", "texto vazio");

    expect(fromFsError(original, "/tmp/pasta")).toBe(original);
  });

  it("inclui o detalhe dos erros desconhecidos", () => {
    expect(fromFsError(fsError("EIO"), "/tmp/pasta").message).toBe(
      "Erro ao acessar /tmp/pasta: EIO: falha"
    );
  });
});
