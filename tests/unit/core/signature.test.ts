import {
  computeSignature,
  signDocument,
  verifySignature,
  checkSignature,
  readEmbeddedSignature,
} from "../../../src/core/signature";
import { ConfigDocument } from "../../../src/core/document";
import { hmacSha1Hex } from "../../../src/core/hmac";
import { StructureError } from "../../../src/core/errors";

const PASSWORD = "test-secret";

const UNSIGNED =
  "<eef>\n" +
  "  <config>\n" +
  "    <uam_dir>/export/hda3/uam</uam_dir>\n" +
  "    <uar_data>AAAAAAAAAA==</uar_data>\n" +
  "    <param>value</param>\n" +
  "  </config>\n" +
  "  <signature>\n  </signature>\n" +
  "</eef>";

describe("computeSignature", () => {
  it("should be deterministic", () => {
    const doc = ConfigDocument.fromString(UNSIGNED);
    expect(computeSignature(doc, PASSWORD)).toBe(computeSignature(doc, PASSWORD));
    expect(computeSignature(doc, PASSWORD)).toMatch(/^[0-9a-f]{40}$/);
  });

  it("should be the HMAC of the canonical config view", () => {
    const doc = ConfigDocument.fromString(UNSIGNED);
    const uarDigest = hmacSha1Hex(PASSWORD, "AAAAAAAAAA==\n");
    const canonical =
      "<config>\n" +
      `    <uar_data>\n/tmp/tmp_uar_data_dir,${uarDigest}\n          </uar_data>\n` +
      "    <param>value</param>\n" +
      "  </config>";

    expect(computeSignature(doc, PASSWORD)).toBe(hmacSha1Hex(PASSWORD, canonical));
  });

  it("should ignore the current signature value", () => {
    const signed = UNSIGNED.replace("<signature>\n  </signature>", "<signature>abc</signature>");
    expect(computeSignature(ConfigDocument.fromString(signed), PASSWORD)).toBe(
      computeSignature(ConfigDocument.fromString(UNSIGNED), PASSWORD),
    );
  });
});

describe("signDocument", () => {
  it("should embed the signature and drop uam_dir", () => {
    const doc = ConfigDocument.fromString(UNSIGNED);
    const signature = signDocument(doc, PASSWORD);

    expect(doc.getText()).toBe(
      '<?xml version="1.0" ?>\n' +
        "<eef>\n" +
        "  <config>\n" +
        "    <uar_data>AAAAAAAAAA==</uar_data>\n" +
        "    <param>value</param>\n" +
        "  </config>\n" +
        `  <signature>${signature}</signature>\n` +
        "</eef>",
    );
  });

  it("should sign the minimal document", () => {
    const doc = ConfigDocument.fromString(
      "<eef><config><uam_dir/><uar_data></uar_data><signature></signature></config></eef>",
    );
    const signature = signDocument(doc, "hellohello");

    expect(signature).toBe(hmacSha1Hex("hellohello", "<config><uar_data/><signature/></config>"));
    expect(doc.getText()).toBe(
      `<?xml version="1.0" ?>\n<eef><config><uar_data/><signature>${signature}</signature></config></eef>`,
    );
    expect(doc.getText()).not.toContain("uam_dir");
  });

  it("should fail with StructureError without a signature element", () => {
    const doc = ConfigDocument.fromString("<eef><config><uam_dir/><uar_data/></config></eef>");
    expect(() => signDocument(doc, PASSWORD)).toThrow(StructureError);
    expect(doc.getText()).toBe("<eef><config><uam_dir/><uar_data/></config></eef>");
  });
});

describe("verifySignature", () => {
  it("should accept a document it signed", () => {
    const doc = ConfigDocument.fromString(UNSIGNED);
    signDocument(doc, PASSWORD);
    expect(verifySignature(doc, PASSWORD)).toBe(true);
  });

  it("should accept the same signature after reloading the signed text", () => {
    const doc = ConfigDocument.fromString(UNSIGNED);
    signDocument(doc, PASSWORD);
    expect(verifySignature(ConfigDocument.fromString(doc.getText()), PASSWORD)).toBe(true);
  });

  it("should detect changes inside config", () => {
    const doc = ConfigDocument.fromString(UNSIGNED);
    signDocument(doc, PASSWORD);
    const tampered = ConfigDocument.fromString(doc.getText().replace("value", "valuf"));

    expect(verifySignature(tampered, PASSWORD)).toBe(false);
  });

  it("should reject a different password", () => {
    const doc = ConfigDocument.fromString(UNSIGNED);
    signDocument(doc, PASSWORD);
    expect(verifySignature(doc, "other-secret")).toBe(false);
  });

  it("should tolerate whitespace around the embedded value", () => {
    const expected = computeSignature(ConfigDocument.fromString(UNSIGNED), PASSWORD);
    const doc = ConfigDocument.fromString(
      UNSIGNED.replace(
        "<signature>\n  </signature>",
        `<signature><![CDATA[\n${expected}\n]]></signature>`,
      ),
    );

    expect(verifySignature(doc, PASSWORD)).toBe(true);
    expect(readEmbeddedSignature(doc)).toBe(expected);
  });

  it("should return false for an empty signature", () => {
    const doc = ConfigDocument.fromString(
      "<eef><config><uam_dir/><uar_data/></config><signature/></eef>",
    );
    const result = checkSignature(doc, PASSWORD);

    expect(result.isValid).toBe(false);
    expect(result.embedded).toBe("");
    expect(result.expected).toBe(hmacSha1Hex(PASSWORD, "<config><uar_data/></config>"));
  });

  it("should fail with StructureError without a signature element", () => {
    const doc = ConfigDocument.fromString("<eef><config><uam_dir/><uar_data/></config></eef>");
    expect(() => verifySignature(doc, PASSWORD)).toThrow(StructureError);
  });
});
