import { describe, it, expect } from "vitest";
import { formatCitation, formatEdition, formatReference } from "./formatters";
import type { BookReference } from "./lib/types";

const book: BookReference = {
  type: "book",
  authors: ["Smith, J."],
  year: "2020",
  title: "Example Title",
  place: "London",
  publisher: "Pearson",
};

describe("formatReference", () => {
  it("joins the five fields in Leeds Harvard order", () => {
    expect(formatReference("Smith, J.", "2020", "Example Title", "Pearson", "London")).toBe(
      "Smith, J. (2020) Example Title. London: Pearson."
    );
  });

  it("returns the same string for the same input", () => {
    const first = formatReference("Smith, J.", "2020", "Example Title", "Pearson", "London");
    const second = formatReference("Smith, J.", "2020", "Example Title", "Pearson", "London");
    expect(second).toBe(first);
  });

  it("trims surrounding whitespace from each field", () => {
    expect(formatReference("  Smith, J. ", " 2020", "Example Title  ", " Pearson", "London ")).toBe(
      "Smith, J. (2020) Example Title. London: Pearson."
    );
  });

  it("uses Unknown Author when the author is empty", () => {
    expect(formatReference("", "2020", "Example Title", "Pearson", "London")).toBe(
      "Unknown Author (2020) Example Title. London: Pearson."
    );
  });

  it("uses n.d. when the year is empty", () => {
    expect(formatReference("Smith, J.", "  ", "Example Title", "Pearson", "London")).toBe(
      "Smith, J. (n.d.) Example Title. London: Pearson."
    );
  });

  it("uses Untitled when the title is empty", () => {
    expect(formatReference("Smith, J.", "2020", "", "Pearson", "London")).toBe(
      "Smith, J. (2020) Untitled. London: Pearson."
    );
  });

  it("keeps whichever of place and publisher is present", () => {
    expect(formatReference("Smith, J.", "2020", "Example Title", "Pearson", "")).toBe(
      "Smith, J. (2020) Example Title. Pearson."
    );
    expect(formatReference("Smith, J.", "2020", "Example Title", "", "London")).toBe(
      "Smith, J. (2020) Example Title. London."
    );
  });

  it("drops the publication segment when place and publisher are both empty", () => {
    expect(formatReference("Smith, J.", "2020", "Example Title", "", "")).toBe(
      "Smith, J. (2020) Example Title."
    );
  });

  it("renders placeholders for an entirely empty form", () => {
    expect(formatReference("", "", "", "", "")).toBe("Unknown Author (n.d.) Untitled.");
  });
});

describe("formatEdition", () => {
  it("appends edn. to a bare edition", () => {
    expect(formatEdition("2nd")).toBe("2nd edn.");
  });

  it("rewrites edition and ed. to edn.", () => {
    expect(formatEdition("2nd Edition")).toBe("2nd edn.");
    expect(formatEdition("Revised ed.")).toBe("revised edn.");
    expect(formatEdition("3rd edn")).toBe("3rd edn.");
  });

  it("omits first and blank editions", () => {
    expect(formatEdition("1st")).toBe("");
    expect(formatEdition("First edition")).toBe("");
    expect(formatEdition("")).toBe("");
    expect(formatEdition(undefined)).toBe("");
  });
});

describe("formatCitation", () => {
  it("italicises book titles in markdown and html", () => {
    const result = formatCitation(book);
    expect(result.text).toBe("Smith, J. (2020) Example Title. London: Pearson.");
    expect(result.markdown).toBe("Smith, J. (2020) *Example Title*. London: Pearson.");
    expect(result.html).toBe("Smith, J. (2020) <i>Example Title</i>. London: Pearson.");
  });

  it("places the edition between title and publication", () => {
    expect(formatCitation({ ...book, edition: "2nd" }).markdown).toBe(
      "Smith, J. (2020) *Example Title*. 2nd edn. London: Pearson."
    );
  });

  it("escapes html in field values", () => {
    expect(formatCitation({ ...book, title: "Cats & <Dogs>" }).html).toBe(
      "Smith, J. (2020) <i>Cats &amp; &lt;Dogs&gt;</i>. London: Pearson."
    );
  });

  it("formats a chapter in an edited book", () => {
    const result = formatCitation({
      type: "chapter",
      authors: ["Jones, P."],
      year: "2019",
      title: "Learning in groups",
      editors: ["Brown, A.", "Green, B."],
      bookTitle: "Teaching Today",
      place: "Leeds",
      publisher: "Example Press",
      pages: "45-60",
    });
    expect(result.text).toBe(
      "Jones, P. (2019) Learning in groups. In: Brown, A. and Green, B. eds. Teaching Today. Leeds: Example Press, pp.45-60."
    );
    expect(result.markdown).toBe(
      "Jones, P. (2019) Learning in groups. In: Brown, A. and Green, B. eds. *Teaching Today*. Leeds: Example Press, pp.45-60."
    );
  });

  it("formats a journal article with volume, issue and pages", () => {
    const result = formatCitation({
      type: "journal",
      authors: ["Smith, J.", "Doe, R.", "Lee, K."],
      year: "2021",
      title: "Sleep and memory",
      journal: "Journal of Examples",
      volume: "12",
      issue: "3",
      pages: "1-10",
    });
    expect(result.markdown).toBe(
      "Smith, J. et al. (2021) Sleep and memory. *Journal of Examples*. **12**(3), pp.1-10."
    );
    expect(result.html).toBe(
      "Smith, J. et al. (2021) Sleep and memory. <i>Journal of Examples</i>. <b>12</b>(3), pp.1-10."
    );
  });

  it("drops missing journal locators with their punctuation", () => {
    const article = {
      type: "journal" as const,
      authors: ["Smith, J."],
      year: "2021",
      title: "Sleep and memory",
      journal: "Journal of Examples",
      volume: "12",
    };
    expect(formatCitation(article).text).toBe(
      "Smith, J. (2021) Sleep and memory. Journal of Examples. 12."
    );
    expect(formatCitation({ ...article, volume: "", pages: "5-9" }).text).toBe(
      "Smith, J. (2021) Sleep and memory. Journal of Examples. pp.5-9."
    );
  });

  it("keeps the issue when the volume is blank", () => {
    const result = formatCitation({
      type: "journal",
      authors: ["Smith, J."],
      year: "2021",
      title: "Sleep and memory",
      journal: "Journal of Examples",
      volume: "",
      issue: "3",
      pages: "1-2",
    });
    expect(result.text).toBe("Smith, J. (2021) Sleep and memory. Journal of Examples. (3), pp.1-2.");
  });

  it("formats a website with access date and link", () => {
    const result = formatCitation({
      type: "website",
      authors: ["Example Organisation"],
      year: "2024",
      title: "Guide to referencing",
      url: "https://example.org/guide",
      accessed: "20 September 2025",
    });
    expect(result.text).toBe(
      "Example Organisation (2024) Guide to referencing. [Online]. [Accessed 20 September 2025]. Available from: https://example.org/guide"
    );
    expect(result.html).toBe(
      'Example Organisation (2024) <i>Guide to referencing</i>. [Online]. [Accessed 20 September 2025]. Available from: <a href="https://example.org/guide" target="_blank" rel="noopener">https://example.org/guide</a>'
    );
  });

  it("leaves out the access date when none is given", () => {
    const result = formatCitation({
      type: "website",
      authors: [],
      year: "",
      title: "Guide to referencing",
      url: "https://example.org/guide",
    });
    expect(result.text).toBe(
      "Unknown Author (n.d.) Guide to referencing. [Online]. Available from: https://example.org/guide"
    );
  });

  it("only links web addresses", () => {
    const result = formatCitation({
      type: "website",
      authors: ["Example Organisation"],
      year: "2024",
      title: "Guide",
      url: "javascript:alert(1)",
    });
    expect(result.runs[result.runs.length - 1]).toEqual({ text: "javascript:alert(1)" });
    expect(result.html).toBe(
      "Example Organisation (2024) <i>Guide</i>. [Online]. Available from: javascript:alert(1)"
    );
  });

  it("links http addresses regardless of case", () => {
    const result = formatCitation({
      type: "website",
      authors: [],
      year: "2024",
      title: "Guide",
      url: "HTTP://example.org",
    });
    expect(result.runs[result.runs.length - 1]).toEqual({
      text: "HTTP://example.org",
      link: "HTTP://example.org",
    });
  });

  it("credits reports to their organisation", () => {
    const result = formatCitation({
      type: "report",
      organisation: "Example Council",
      year: "2022",
      title: "Annual review",
      place: "Leeds",
      publisher: "Example Council",
    });
    expect(result.text).toBe("Example Council (2022) Annual review. Leeds: Example Council.");
  });

  it("formats a thesis with degree and university", () => {
    const result = formatCitation({
      type: "thesis",
      authors: ["Khan, S."],
      year: "2018",
      title: "Reading habits",
      degree: "PhD thesis",
      university: "University of Leeds",
    });
    expect(result.text).toBe("Khan, S. (2018) Reading habits. PhD thesis. University of Leeds.");
  });
});
