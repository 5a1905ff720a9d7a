import { randomUUID } from "node:crypto";
import { mkdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { parseDepositConfig, type DepositConfigInput } from "../config.js";
import { FragmentParseError } from "../errors.js";
import type { Article, Reference } from "../types.js";
import { XML_DECLARATION, serializeElement } from "../xml/serialize.js";
import { createElement, findChild, findChildren, subElement, type XmlElement } from "../xml/tree.js";
import { buildDeposit, createRoot, depositXml, resolveVolume, writeDeposit } from "./assembler.js";

const RUN_DATE = new Date(Date.UTC(2024, 0, 5, 3, 4, 5));
const LICENSE_HREF = "http://creativecommons.org/licenses/by/4.0/";

function makeArticle(overrides: Partial<Article> = {}): Article {
  return {
    doi: "10.5555/example.00666",
    manuscript: "00666",
    journalTitle: "Example Journal",
    journalIssn: "1234-5678",
    title: "A study",
    selfUris: [],
    datasets: [],
    references: [],
    components: [],
    contributors: [],
    fundingAwards: [],
    dates: {},
    ...overrides,
  };
}

function makeConfig(input: DepositConfigInput = {}) {
  return parseDepositConfig({
    depositorName: "Example Press",
    emailAddress: "deposits@example.org",
    registrant: "Example Press",
    ...input,
  });
}

function child(parent: XmlElement, name: string): XmlElement {
  const found = findChild(parent, name);
  if (!found) throw new Error(`Missing <${name}> in <${parent.name}>`);
  return found;
}

function childNames(parent: XmlElement): string[] {
  return parent.children.flatMap((node) => (node.type === "element" ? [node.name] : []));
}

function journalArticle(root: XmlElement, index = 0): XmlElement {
  const journal = findChildren(child(root, "body"), "journal")[index];
  if (!journal) throw new Error(`Missing journal ${index}`);
  return child(journal, "journal_article");
}

function build(article: Article, input: DepositConfigInput = {}): XmlElement {
  return buildDeposit([article], makeConfig(input), { pubDate: RUN_DATE }).root;
}

describe("createRoot", () => {
  it("declares every namespace for current schema versions", () => {
    const root = createRoot("4.4.1");
    expect(Object.keys(root.attributes)).toEqual([
      "version",
      "xmlns",
      "xmlns:xsi",
      "xmlns:fr",
      "xmlns:ai",
      "xmlns:ct",
      "xmlns:rel",
      "xsi:schemaLocation",
      "xmlns:mml",
      "xmlns:jats",
    ]);
    expect(root.attributes["xmlns"]).toBe("http://www.crossref.org/schema/4.4.1");
    expect(root.attributes["xsi:schemaLocation"]).toBe(
      "http://www.crossref.org/schema/4.4.1 http://www.crossref.org/schemas/crossref4.4.1.xsd"
    );
  });

  it("omits the clinical trials and relations namespaces for 4.3.5", () => {
    const root = createRoot("4.3.5");
    expect(root.attributes["xmlns:ct"]).toBeUndefined();
    expect(root.attributes["xmlns:rel"]).toBeUndefined();
    expect(root.attributes["version"]).toBe("4.3.5");
  });
});

describe("buildDeposit", () => {
  describe("envelope", () => {
    it("adds the generated-by comment first", () => {
      const { root } = buildDeposit([makeArticle()], makeConfig(), { pubDate: RUN_DATE });
      expect(root.children[0]).toEqual({
        type: "comment",
        text: "generated by crossref-deposit at 2024-01-05 03:04:05",
      });
    });

    it("can leave out the comment", () => {
      const { root } = buildDeposit([makeArticle()], makeConfig(), { pubDate: RUN_DATE, addComment: false });
      expect(childNames(root)).toEqual(["head", "body"]);
      expect(root.children).toHaveLength(2);
    });

    it("writes the head block", () => {
      const { root, batchId } = buildDeposit([makeArticle()], makeConfig(), { pubDate: RUN_DATE });
      expect(batchId).toBe("crossref-00666-20240105030405");
      expect(serializeElement(child(root, "head"))).toBe(
        "<head><doi_batch_id>crossref-00666-20240105030405</doi_batch_id>" +
          "<timestamp>20240105030405</timestamp>" +
          "<depositor><depositor_name>Example Press</depositor_name>" +
          "<email_address>deposits@example.org</email_address></depositor>" +
          "<registrant>Example Press</registrant></head>"
      );
    });

    it("writes one journal per article in order", () => {
      const { root } = buildDeposit(
        [makeArticle(), makeArticle({ doi: "10.5555/example.00777", manuscript: "00777" })],
        makeConfig(),
        { pubDate: RUN_DATE }
      );
      const journals = findChildren(child(root, "body"), "journal");
      expect(journals).toHaveLength(2);
      const identifier = child(child(journalArticle(root, 1), "publisher_item"), "identifier");
      expect(serializeElement(identifier)).toBe('<identifier id_type="doi">10.5555/example.00777</identifier>');
    });
  });

  describe("journal", () => {
    it("writes journal metadata", () => {
      const journal = child(child(build(makeArticle()), "body"), "journal");
      expect(serializeElement(child(journal, "journal_metadata"))).toBe(
        '<journal_metadata language="en"><full_title>Example Journal</full_title>' +
          '<issn media_type="electronic">1234-5678</issn></journal_metadata>'
      );
    });

    it("uses the first configured date type present on the article", () => {
      const article = makeArticle({
        dates: { pub: new Date(Date.UTC(2023, 8, 7)), accepted: new Date(Date.UTC(2023, 5, 1)) },
      });
      const root = build(article, { pubDateTypes: ["posted", "pub", "accepted"] });
      expect(serializeElement(child(journalArticle(root), "publication_date"))).toBe(
        '<publication_date media_type="online"><month>09</month><day>07</day><year>2023</year></publication_date>'
      );
    });

    it("ignores date types named like object members", () => {
      const article = makeArticle({ dates: { pub: new Date(Date.UTC(2023, 8, 7)) } });
      const root = build(article, { pubDateTypes: ["constructor", "toString", "pub"] });
      expect(serializeElement(child(journalArticle(root), "publication_date"))).toBe(
        '<publication_date media_type="online"><month>09</month><day>07</day><year>2023</year></publication_date>'
      );
    });

    it("falls back to the run date", () => {
      const root = build(makeArticle());
      expect(serializeElement(child(journalArticle(root), "publication_date"))).toBe(
        '<publication_date media_type="online"><month>01</month><day>05</day><year>2024</year></publication_date>'
      );
    });

    it("writes the issue with the article volume", () => {
      const journal = child(child(build(makeArticle({ volume: "5" })), "body"), "journal");
      expect(serializeElement(child(journal, "journal_issue"))).toBe(
        '<journal_issue><publication_date media_type="online"><month>01</month><day>05</day><year>2024</year>' +
          "</publication_date><journal_volume><volume>5</volume></journal_volume></journal_issue>"
      );
    });

    it("computes the volume from the year of the first volume", () => {
      expect(resolveVolume(makeArticle(), makeConfig({ yearOfFirstVolume: 2012 }), RUN_DATE)).toBe("13");
      expect(resolveVolume(makeArticle(), makeConfig(), RUN_DATE)).toBeUndefined();
    });

    it("omits the volume when it cannot be resolved", () => {
      const journal = child(child(build(makeArticle()), "body"), "journal");
      expect(childNames(child(journal, "journal_issue"))).toEqual(["publication_date"]);
    });
  });

  describe("journal article", () => {
    it("contains only the mandatory sections for a minimal article", () => {
      const element = journalArticle(build(makeArticle()));
      expect(element.attributes).toEqual({ publication_type: "full_text" });
      expect(childNames(element)).toEqual(["titles", "publication_date", "publisher_item", "doi_data"]);
    });

    it("composes every section in order", () => {
      const article = makeArticle({
        abstract: "<p>Abstract text</p>",
        digest: "<p>Digest text</p>",
        license: { href: LICENSE_HREF },
        contributors: [{ contribType: "author", surname: "Smith", affiliations: [] }],
        fundingAwards: [{ institutionName: "Science Fund", awardIds: [] }],
        datasets: [{ doi: "10.5061/dryad.1" }],
        references: [{ id: "bib1", publicationType: "journal", authors: [], doi: "10.1000/cells.1" }],
        components: [{ id: "fig1", title: "Figure 1", permissions: [] }],
      });
      const element = journalArticle(
        build(article, { accessIndicatorsAppliesTo: ["vor"], archiveLocations: ["CLOCKSS"] })
      );
      expect(childNames(element)).toEqual([
        "titles",
        "contributors",
        "jats:abstract",
        "jats:abstract",
        "publication_date",
        "publisher_item",
        "fr:program",
        "ai:program",
        "rel:program",
        "archive_locations",
        "doi_data",
        "citation_list",
        "component_list",
      ]);
    });

    it("sets the reference distribution option", () => {
      const element = journalArticle(build(makeArticle(), { referenceDistributionOpts: "any" }));
      expect(element.attributes).toEqual({ publication_type: "full_text", reference_distribution_opts: "any" });
    });

    it("renders the title without external links", () => {
      const article = makeArticle({
        title: 'A <italic>study</italic> of <ext-link ext-link-type="uri">flies</ext-link>',
      });
      expect(serializeElement(child(journalArticle(build(article, { faceMarkup: true })), "titles"))).toBe(
        "<titles><title>A <i>study</i> of flies</title></titles>"
      );
      expect(serializeElement(child(journalArticle(build(article)), "titles"))).toBe(
        "<titles><title>A study of flies</title></titles>"
      );
    });

    it("fails the whole call on a malformed fragment", () => {
      const article = makeArticle({ title: "<italic>broken" });
      expect(() => build(article, { faceMarkup: true })).toThrow(FragmentParseError);
    });

    it("marks the digest as an executive summary", () => {
      const element = journalArticle(
        build(makeArticle({ abstract: "<p>Abstract text</p>", digest: "<p>Digest text</p>" }))
      );
      const [abstract, digest] = findChildren(element, "jats:abstract");
      expect(abstract && serializeElement(abstract)).toBe(
        "<jats:abstract><jats:p>Abstract text</jats:p></jats:abstract>"
      );
      expect(digest && serializeElement(digest)).toBe(
        '<jats:abstract abstract-type="executive-summary"><jats:p>Digest text</jats:p></jats:abstract>'
      );
    });

    it("writes the article number when enabled and present", () => {
      const article = makeArticle({ elocationId: "e00666" });
      expect(serializeElement(child(journalArticle(build(article)), "publisher_item"))).toBe(
        '<publisher_item><item_number item_number_type="article_number">e00666</item_number>' +
          '<identifier id_type="doi">10.5555/example.00666</identifier></publisher_item>'
      );
      expect(serializeElement(child(journalArticle(build(article, { elocationId: false })), "publisher_item"))).toBe(
        '<publisher_item><identifier id_type="doi">10.5555/example.00666</identifier></publisher_item>'
      );
    });

    it("uses injected contributor and funding builders", () => {
      const { root } = buildDeposit([makeArticle()], makeConfig(), {
        pubDate: RUN_DATE,
        contributors: () => {
          const contributors = createElement("contributors");
          subElement(contributors, "organization", {}, "Team");
          return contributors;
        },
        funding: () => undefined,
      });
      const element = journalArticle(root);
      expect(childNames(element)).toEqual(["titles", "contributors", "publication_date", "publisher_item", "doi_data"]);
      expect(serializeElement(child(element, "contributors"))).toBe(
        "<contributors><organization>Team</organization></contributors>"
      );
    });

    it("writes archive locations", () => {
      const element = journalArticle(build(makeArticle(), { archiveLocations: ["CLOCKSS", "LOCKSS"] }));
      expect(serializeElement(child(element, "archive_locations"))).toBe(
        '<archive_locations><archive name="CLOCKSS"/><archive name="LOCKSS"/></archive_locations>'
      );
    });
  });

  describe("access indicators", () => {
    it("are omitted without configured scopes", () => {
      const element = journalArticle(build(makeArticle({ license: { href: LICENSE_HREF } })));
      expect(findChild(element, "ai:program")).toBeUndefined();
    });

    it("are omitted without a license", () => {
      const element = journalArticle(build(makeArticle(), { accessIndicatorsAppliesTo: ["vor"] }));
      expect(findChild(element, "ai:program")).toBeUndefined();
    });

    it("link every scope to the license", () => {
      const element = journalArticle(
        build(makeArticle({ license: { href: LICENSE_HREF } }), { accessIndicatorsAppliesTo: ["vor", "tdm"] })
      );
      const program = child(element, "ai:program");
      expect(program.attributes).toEqual({ name: "AccessIndicators" });
      expect(findChildren(program, "ai:license_ref").map((ref) => serializeElement(ref))).toEqual([
        `<ai:license_ref applies_to="vor">${LICENSE_HREF}</ai:license_ref>`,
        `<ai:license_ref applies_to="tdm">${LICENSE_HREF}</ai:license_ref>`,
      ]);
    });
  });

  describe("relations", () => {
    const dataRef = (overrides: Partial<Reference>): Reference => ({
      publicationType: "data",
      authors: [],
      ...overrides,
    });

    it("links a data citation with only a doi", () => {
      const element = journalArticle(build(makeArticle({ references: [dataRef({ doi: "10.5061/dryad.1" })] })));
      const programs = findChildren(element, "rel:program");
      expect(programs).toHaveLength(1);
      const items = findChildren(programs[0] ?? element, "rel:related_item");
      expect(items.map((item) => serializeElement(item))).toEqual([
        "<rel:related_item>" +
          '<rel:inter_work_relation relationship-type="references" identifier-type="doi">10.5061/dryad.1</rel:inter_work_relation>' +
          "</rel:related_item>",
      ]);
    });

    it("shares one container between entries", () => {
      const article = makeArticle({
        datasets: [{ title: "Reads", accessionId: "GSE1" }],
        references: [dataRef({ doi: "10.5061/dryad.1" }), dataRef({ uri: "https://example.org/data" })],
      });
      const element = journalArticle(build(article));
      const programs = findChildren(element, "rel:program");
      expect(programs).toHaveLength(1);
      expect(findChildren(programs[0] ?? element, "rel:related_item")).toHaveLength(3);
    });

    it("places the container before the doi data and the citation list", () => {
      const element = journalArticle(build(makeArticle({ references: [dataRef({ pmid: "123456" })] })));
      expect(childNames(element)).toEqual([
        "titles",
        "publication_date",
        "publisher_item",
        "rel:program",
        "doi_data",
        "citation_list",
      ]);
    });

    it("creates no container without identifiers", () => {
      const article = makeArticle({ datasets: [{ title: "Unlinked" }], references: [dataRef({ dataTitle: "Data" })] });
      expect(findChild(journalArticle(build(article)), "rel:program")).toBeUndefined();
    });
  });

  describe("citations", () => {
    const ref: Reference = { id: "bib1", authors: [], elocationId: "e1001" };

    it("writes the elocation id as first_page for legacy schema versions", () => {
      const element = journalArticle(build(makeArticle({ references: [ref] }), { schemaVersion: "4.4.0" }));
      expect(serializeElement(child(element, "citation_list"))).toBe(
        '<citation_list><citation key="bib1"><first_page>e1001</first_page></citation></citation_list>'
      );
    });

    it("writes the elocation id in its own field for newer schema versions", () => {
      const element = journalArticle(build(makeArticle({ references: [ref] }), { schemaVersion: "4.4.2" }));
      expect(serializeElement(child(element, "citation_list"))).toBe(
        '<citation_list><citation key="bib1"><elocation_id>e1001</elocation_id></citation></citation_list>'
      );
    });
  });

  describe("doi data", () => {
    it("uses the configured resource template and text mining links", () => {
      const article = makeArticle({
        license: { href: LICENSE_HREF },
        selfUris: [{ href: "https://example.org/articles/00666-v1.pdf", contentType: "pdf" }],
      });
      const element = journalArticle(
        build(article, {
          doiPattern: "https://example.org/articles/{manuscript}",
          textMiningPdfPattern: "https://example.org/articles/{manuscript}.pdf",
          textMiningXmlPattern: "https://example.org/articles/{manuscript}.xml",
        })
      );
      expect(serializeElement(child(element, "doi_data"))).toBe(
        "<doi_data><doi>10.5555/example.00666</doi><resource>https://example.org/articles/00666</resource>" +
          '<collection property="text-mining">' +
          '<item><resource mime_type="application/pdf">https://example.org/articles/00666.pdf</resource></item>' +
          '<item><resource mime_type="application/xml">https://example.org/articles/00666.xml</resource></item>' +
          "</collection></doi_data>"
      );
    });

    it("omits the resource when it cannot be resolved", () => {
      expect(serializeElement(child(journalArticle(build(makeArticle())), "doi_data"))).toBe(
        "<doi_data><doi>10.5555/example.00666</doi></doi_data>"
      );
    });

    it("omits text mining links for unlicensed articles", () => {
      const element = journalArticle(
        build(makeArticle(), { textMiningXmlPattern: "https://example.org/articles/{manuscript}.xml" })
      );
      expect(findChild(child(element, "doi_data"), "collection")).toBeUndefined();
    });
  });

  describe("components", () => {
    const componentConfig: DepositConfigInput = {
      componentDoiPattern: "https://example.org/articles/{manuscript}/figures#{id}",
      componentLicenseRef: LICENSE_HREF,
    };

    it("writes titles, format, permissions and doi data", () => {
      const article = makeArticle({
        components: [
          {
            id: "fig1",
            title: "Figure 1",
            subtitle: "Cells in <italic>culture</italic>",
            mimeType: "jpg",
            permissions: [{ license: "CC BY" }],
            doi: "10.5555/example.00666.003",
          },
        ],
      });
      const componentList = child(journalArticle(build(article, componentConfig)), "component_list");
      expect(serializeElement(componentList)).toBe(
        '<component_list><component parent_relation="isPartOf">' +
          "<titles><title>Figure 1</title><subtitle>Cells in culture</subtitle></titles>" +
          '<format mime_type="image/jpeg"/>' +
          `<ai:program name="AccessIndicators"><ai:license_ref>${LICENSE_HREF}</ai:license_ref></ai:program>` +
          "<doi_data><doi>10.5555/example.00666.003</doi>" +
          "<resource>https://example.org/articles/00666/figures#fig1</resource></doi_data>" +
          "</component></component_list>"
      );
    });

    it("omits the format for unknown mime types", () => {
      const article = makeArticle({
        components: [{ id: "media1", title: "Video 1", mimeType: "video/x-unknown", permissions: [] }],
      });
      const component = child(child(journalArticle(build(article, componentConfig)), "component_list"), "component");
      expect(childNames(component)).toEqual(["titles"]);
    });

    it("omits the format for mime types named like object members", () => {
      const article = makeArticle({
        components: [
          { id: "fig1", title: "Figure 1", mimeType: "constructor", permissions: [] },
          { id: "fig2", title: "Figure 2", mimeType: "__proto__", permissions: [] },
        ],
      });
      const xml = depositXml([article], makeConfig(componentConfig), { pubDate: RUN_DATE });
      expect(xml).toContain(
        '<component_list><component parent_relation="isPartOf"><titles><title>Figure 1</title></titles></component>' +
          '<component parent_relation="isPartOf"><titles><title>Figure 2</title></titles></component></component_list>'
      );
    });

    it("omits permissions without a copyright statement or license", () => {
      const article = makeArticle({
        components: [{ id: "fig2", title: "Figure 2", permissions: [{}] }],
      });
      const component = child(child(journalArticle(build(article, componentConfig)), "component_list"), "component");
      expect(findChild(component, "ai:program")).toBeUndefined();
    });

    it("omits doi data without a component template", () => {
      const article = makeArticle({
        components: [{ id: "fig1", title: "Figure 1", permissions: [], doi: "10.5555/example.00666.003" }],
      });
      const component = child(child(journalArticle(build(article)), "component_list"), "component");
      expect(findChild(component, "doi_data")).toBeUndefined();
    });
  });
});

describe("depositXml", () => {
  it("serializes with the XML declaration", () => {
    const xml = depositXml([makeArticle()], makeConfig(), { pubDate: RUN_DATE });
    expect(xml.startsWith(`${XML_DECLARATION}<doi_batch version="4.4.1" xmlns="http://www.crossref.org/schema/4.4.1"`)).toBe(
      true
    );
    expect(xml.endsWith("</body></doi_batch>")).toBe(true);
  });

  it("pretty prints with the given indent", () => {
    const xml = depositXml([makeArticle()], makeConfig(), { pubDate: RUN_DATE, pretty: true, indent: "  " });
    expect(xml).toContain("\n  <head>\n    <doi_batch_id>crossref-00666-20240105030405</doi_batch_id>");
  });
});

describe("writeDeposit", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `crossref-deposit-out-${Date.now()}-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("writes the document named after the batch id", async () => {
    const outputDir = join(testDir, "batches");
    const result = await writeDeposit([makeArticle()], makeConfig(), outputDir, { pubDate: RUN_DATE });
    expect(result).toEqual({
      batchId: "crossref-00666-20240105030405",
      path: join(outputDir, "crossref-00666-20240105030405.xml"),
    });
    const content = await readFile(result.path, "utf-8");
    expect(content).toBe(depositXml([makeArticle()], makeConfig(), { pubDate: RUN_DATE }));
  });
});
