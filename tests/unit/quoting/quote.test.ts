import { describe, expect, it } from "vitest";
import { MsSqlDialect } from "../../../src/drivers/mssql/mssql-dialect";
import { MySqlDialect } from "../../../src/drivers/mysql/mysql-dialect";
import { PostgresDialect } from "../../../src/drivers/postgres/postgres-dialect";
import {
  quote,
  quoteColumns,
  quoteJoin,
  quoteJoinFunc,
  unquote,
} from "../../../src/quoting/quote";
import { Quoter } from "../../../src/quoting/quoter";
import { QuoteMode, QuotePolicy } from "../../../src/types";
import { createMockDialect } from "../../helpers/mock-dialect";

describe("quote()", () => {
  const postgres = new Quoter(new PostgresDialect(), {
    quoteMode: QuoteMode.TableAndColumns,
    quotePolicy: QuotePolicy.AddAlways,
  });

  describe("AddAlways", () => {
    it("should wrap a plain identifier in the dialect quotes", () => {
      expect(quote(postgres, "users", false)).toBe('"users"');
      expect(quote(postgres, "email", true)).toBe('"email"');
    });

    it("should quote every segment of a dotted identifier", () => {
      expect(quote(postgres, "a.b", true)).toBe('"a"."b"');
    });

    it("should leave the wildcard alone", () => {
      expect(quote(postgres, "*", true)).toBe("*");
    });

    it("should rewrite identifiers quoted for a backtick dialect", () => {
      expect(quote(postgres, "`col`", true)).toBe('"col"');
      expect(quote(postgres, "`users`.`id`", true)).toBe('"users"."id"');
    });

    it("should give the same output when run on its own output", () => {
      const values = ["users", "public.users", "`orders`.total", '"a".b', "*"];

      for (const value of values) {
        const once = quote(postgres, value, true);
        expect(quote(postgres, once, true)).toBe(once);
      }
    });

    it("should quote bracket dialects", () => {
      const mssql = new Quoter(new MsSqlDialect(), { quotePolicy: QuotePolicy.AddAlways });

      expect(quote(mssql, "dbo.users", false)).toBe("[dbo].[users]");
      expect(quote(mssql, "`dbo`.`users`", false)).toBe("[dbo].[users]");
    });
  });

  describe("NoAdd", () => {
    const quoter = new Quoter(new PostgresDialect(), { quotePolicy: QuotePolicy.NoAdd });

    it("should return every value unchanged", () => {
      expect(quote(quoter, "users", false)).toBe("users");
      expect(quote(quoter, "select", true)).toBe("select");
      expect(quote(quoter, "`users`.`id`", true)).toBe("`users`.`id`");
      expect(quote(quoter, "  spaced ", true)).toBe("  spaced ");
    });
  });

  describe("AddReserved", () => {
    const quoter = new Quoter(createMockDialect('"', '"', ["select"]), {
      quotePolicy: QuotePolicy.AddReserved,
    });

    it("should quote reserved words", () => {
      expect(quote(quoter, "select", true)).toBe('"select"');
    });

    it("should leave other words unquoted", () => {
      expect(quote(quoter, "users", true)).toBe("users");
    });

    it("should check the untrimmed value", () => {
      expect(quote(quoter, " select ", true)).toBe(" select ");
    });

    it("should use the dialect reserved words", () => {
      const postgresReserved = new Quoter(new PostgresDialect(), {
        quotePolicy: QuotePolicy.AddReserved,
      });

      expect(quote(postgresReserved, "user", false)).toBe('"user"');
      expect(quote(postgresReserved, "ORDER", true)).toBe('"ORDER"');
      expect(quote(postgresReserved, "accounts", false)).toBe("accounts");
    });
  });

  describe("quote modes", () => {
    it("should only quote tables under TableOnly", () => {
      const quoter = new Quoter(new PostgresDialect(), { quoteMode: QuoteMode.TableOnly });

      expect(quote(quoter, "users", false)).toBe('"users"');
      expect(quote(quoter, "id", true)).toBe("id");
    });

    it("should only quote columns under ColumnsOnly", () => {
      const quoter = new Quoter(new PostgresDialect(), { quoteMode: QuoteMode.ColumnsOnly });

      expect(quote(quoter, "users", false)).toBe("users");
      expect(quote(quoter, "id", true)).toBe('"id"');
    });

    it("should not normalize foreign quotes when the mode does not apply", () => {
      const quoter = new Quoter(new PostgresDialect(), { quoteMode: QuoteMode.TableOnly });

      expect(quote(quoter, "`users`.`id`", true)).toBe("`users`.`id`");
    });
  });
});

describe("quoteColumns()", () => {
  const mysql = new Quoter(new MySqlDialect(), { quotePolicy: QuotePolicy.AddAlways });

  it("should quote every column of the list", () => {
    expect(quoteColumns(mysql, "a,b,c")).toBe("`a`,`b`,`c`");
  });

  it("should trim the columns and join without spaces", () => {
    expect(quoteColumns(mysql, "id, name ,email")).toBe("`id`,`name`,`email`");
  });

  it("should handle qualified and pre-quoted columns", () => {
    expect(quoteColumns(mysql, "users.id,`users`.name")).toBe("`users`.`id`,`users`.`name`");
  });

  it("should keep empty segments empty", () => {
    expect(quoteColumns(mysql, "a,,b")).toBe("`a`,,`b`");
  });

  it("should honour the reserved word policy per column", () => {
    const postgres = new Quoter(new PostgresDialect(), { quotePolicy: QuotePolicy.AddReserved });

    expect(quoteColumns(postgres, "id,order,total")).toBe('id,"order",total');
  });
});

describe("quoteJoin()", () => {
  it("should quote the items as columns and join them with a comma", () => {
    const postgres = new Quoter(new PostgresDialect(), { quoteMode: QuoteMode.ColumnsOnly });

    expect(quoteJoin(postgres, ["users.id", "`name`"])).toBe('"users"."id","name"');
  });

  it("should not modify the given array", () => {
    const postgres = new Quoter(new PostgresDialect());
    const columns = ["id", "name"];

    quoteJoin(postgres, columns);

    expect(columns).toEqual(["id", "name"]);
  });
});

describe("quoteJoinFunc()", () => {
  const postgres = new Quoter(new PostgresDialect());
  const quoteColumn = (column: string) => quote(postgres, column, true);

  it("should join the quoted items with the separator and a space", () => {
    expect(quoteJoinFunc(["a", "b"], quoteColumn, ",")).toBe('"a", "b"');
  });

  it("should accept word separators", () => {
    expect(quoteJoinFunc(["x", "y"], (item) => `${item} = ?`, " AND")).toBe("x = ? AND y = ?");
  });

  it("should return an empty string for no items", () => {
    expect(quoteJoinFunc([], quoteColumn, ",")).toBe("");
  });

  it("should not modify the given array", () => {
    const items = ["a", "b"];

    quoteJoinFunc(items, quoteColumn, ",");

    expect(items).toEqual(["a", "b"]);
  });
});

describe("unquote()", () => {
  const postgres = new Quoter(new PostgresDialect());

  it("should strip the dialect quotes", () => {
    expect(unquote(postgres, '"users"')).toBe("users");
  });

  it("should strip backticks whatever the dialect", () => {
    expect(unquote(postgres, "`users`")).toBe("users");
  });

  it("should strip repeated and mismatched quote characters", () => {
    expect(unquote(postgres, '""users`')).toBe("users");
  });

  it("should only strip the ends of the value", () => {
    expect(unquote(postgres, '"public"."users"')).toBe('public"."users');
  });

  it("should strip bracket quotes", () => {
    const mssql = new Quoter(new MsSqlDialect());

    expect(unquote(mssql, "[users]")).toBe("users");
  });

  it("should return an empty string when only quotes are given", () => {
    expect(unquote(postgres, '""')).toBe("");
    expect(unquote(postgres, "")).toBe("");
  });

  it("should restore a quoted plain identifier", () => {
    for (const value of ["users", "created_at", "Order"]) {
      expect(unquote(postgres, quote(postgres, value, true))).toBe(value);
    }
  });
});
