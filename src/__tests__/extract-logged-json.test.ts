import { describe, it, expect } from "vitest";
import { extractFromScript, extractLoggedJson } from "../scrape/extractLoggedJson.js";
import { ParseError } from "../errors.js";

const PAGE = `<!doctype html>
<html><head>
<script src="/bundle.js">console.log({"name":"FromExternal"})</script>
</head><body>
<script>
  var total = 3;
  console.log({"name":"Acme","secteur":"Fintech"});
  console.log("Companies:", [{"name":"Beta","secteur":"Agritech"},{"name":"Gamma"}]);
  console.log({"name": "Broken",});
  console.log({name: 'NotJson'});
  console.info("no objects here");
</script>
<script type="application/ld+json">{"name":"NotLogged"}</script>
</body></html>`;

describe("extractLoggedJson", () => {
  it("parses object and array arguments of logging calls in inline scripts", () => {
    const { values } = extractLoggedJson(PAGE);
    expect(values).toEqual([
      { name: "Acme", secteur: "Fintech" },
      [
        { name: "Beta", secteur: "Agritech" },
        { name: "Gamma" },
      ],
    ]);
  });

  it("skips malformed fragments without failing the page", () => {
    const { skipped } = extractLoggedJson(PAGE);
    expect(skipped).toHaveLength(2);
    expect(skipped.every((e) => e instanceof ParseError)).toBe(true);
    expect(skipped[0]?.message).toBe('Malformed JSON fragment: {"name": "Broken",}');
  });

  it("ignores scripts loaded by src and data not passed to a logging call", () => {
    const names = JSON.stringify(extractLoggedJson(PAGE).values);
    expect(names).not.toContain("FromExternal");
    expect(names).not.toContain("NotLogged");
  });
});

describe("extractFromScript", () => {
  it("keeps brackets inside string values", () => {
    const { values, skipped } = extractFromScript(`console.log({"description":"Tools (and [more]) for {teams}","name":"X"})`);
    expect(skipped).toEqual([]);
    expect(values).toEqual([{ description: "Tools (and [more]) for {teams}", name: "X" }]);
  });

  it("does not treat nested call arguments as logged values", () => {
    const { values } = extractFromScript(`console.log(render({"name":"Hidden"}), {"name":"Shown"})`);
    expect(values).toEqual([{ name: "Shown" }]);
  });

  it("reports an unterminated fragment as skipped", () => {
    const { values, skipped } = extractFromScript(`console.log({"name":"Cut"`);
    expect(values).toEqual([]);
    expect(skipped).toHaveLength(1);
  });

  it("finds every logging call of a script", () => {
    const { values } = extractFromScript(
      `console.log({"a":1}); doStuff(); console.debug([1,2]); console . warn ({"b":2})`
    );
    expect(values).toEqual([{ a: 1 }, [1, 2], { b: 2 }]);
  });

  it("resumes at the next logging call after arguments that cannot be scanned", () => {
    const { values, skipped } = extractFromScript(`console.log({"name":"A"]); console.log({"name":"B"});`);
    expect(values).toEqual([{ name: "B" }]);
    expect(skipped.map((e) => e.message)).toEqual([
      'Unbalanced logging call arguments: {"name":"A"]); console.log({"name":"B"});',
    ]);
  });

  it("skips line and block comments inside the argument list", () => {
    const { values, skipped } = extractFromScript(
      `console.log({"name":"A"} // don't\n); console.log(/* it's [ */ {"name":"B"});`
    );
    expect(skipped).toEqual([]);
    expect(values).toEqual([{ name: "A" }, { name: "B" }]);
  });
});
