import { describe, expect, it } from "vitest";
import { extractMarkupSignals, findPhoneNumbers } from "./extractor";
import { PASSING_HTML } from "./test-support";

function page(body: string, head = ""): string {
  return `<html><head>${head}</head><body>${body}</body></html>`;
}

describe("extractMarkupSignals", () => {
  it("reads every markup signal from a complete homepage", () => {
    const signals = extractMarkupSignals(PASSING_HTML);

    expect(signals.title).toBe("Example CPA");
    expect(signals.pageStructure).toEqual({
      status: "present",
      value: { hasHeader: true, hasNav: true, hasFooter: true },
    });
    expect(signals.conversion.cta).toEqual({ status: "present", value: { ctaTexts: ["Schedule a Consultation"] } });
    expect(signals.conversion.contactForm).toEqual({ status: "present", value: { found: true, formCount: 1 } });
    expect(signals.conversion.phone).toEqual({
      status: "present",
      value: { numbers: ["(555) 123-4567"], clickable: true },
    });
    expect(signals.trust.team).toEqual({ status: "present", value: { found: true } });
    expect(signals.trust.credentials).toEqual({ status: "present", value: { credentials: ["CPA", "LICENSED"] } });
    expect(signals.trust.googleMaps).toEqual({ status: "present", value: { found: true } });
    expect(signals.seo.metaDescription).toEqual({
      status: "present",
      value: { content: "Tax and bookkeeping for small businesses" },
    });
    expect(signals.seo.headings).toEqual({ status: "present", value: { h1Count: 1 } });
    expect(signals.seo.footerNap).toEqual({
      status: "present",
      value: { footerFound: true, phone: "(555) 123-4567", email: null, hasAddress: true },
    });
    expect(signals.viewport).toEqual({ status: "present", value: { present: true } });
  });

  it("reports missing elements as present-but-failing facts", () => {
    const signals = extractMarkupSignals(page("<p>Welcome</p>"));

    expect(signals.title).toBeNull();
    expect(signals.conversion.cta).toEqual({ status: "present", value: { ctaTexts: [] } });
    expect(signals.conversion.phone).toEqual({ status: "present", value: { numbers: [], clickable: false } });
    expect(signals.seo.metaDescription).toEqual({ status: "present", value: { content: null } });
    expect(signals.seo.footerNap).toEqual({
      status: "present",
      value: { footerFound: false, phone: null, email: null, hasAddress: false },
    });
    expect(signals.viewport).toEqual({ status: "present", value: { present: false } });
  });

  it("only counts links as CTAs when they are styled as buttons", () => {
    const signals = extractMarkupSignals(
      page(`
        <a href="/contact">Contact us</a>
        <a class="cta-link" href="/start">Get Started Today</a>
        <button>Book an appointment</button>
        <input type="submit" value="Send">
      `)
    );

    expect(signals.conversion.cta).toEqual({
      status: "present",
      value: { ctaTexts: ["Get Started Today", "Book an appointment"] },
    });
  });

  it("ignores search boxes and newsletter sign-ups without contact fields", () => {
    const signals = extractMarkupSignals(
      page(`
        <form><input type="search" name="q"><button>Go</button></form>
        <form><input type="hidden" name="token"><input type="text" name="name"></form>
      `)
    );

    expect(signals.conversion.contactForm).toEqual({ status: "present", value: { found: false, formCount: 2 } });
  });

  it("falls back to tel: hrefs for icon-only phone links", () => {
    const signals = extractMarkupSignals(page(`<a href="tel:+15551234567"><img alt=""></a>`));

    expect(signals.conversion.phone).toEqual({
      status: "present",
      value: { numbers: ["+15551234567"], clickable: true },
    });
  });

  it("does not read phone numbers out of scripts", () => {
    const signals = extractMarkupSignals(page(`<script>var id = "555-123-4567";</script><p>Hello</p>`));

    expect(signals.conversion.phone).toEqual({ status: "present", value: { numbers: [], clickable: false } });
  });

  it("counts every H1", () => {
    const signals = extractMarkupSignals(page("<h1>One</h1><h1>Two</h1>"));
    expect(signals.seo.headings).toEqual({ status: "present", value: { h1Count: 2 } });
  });
});

describe("findPhoneNumbers", () => {
  it("finds common US formats once each", () => {
    expect(findPhoneNumbers("Call (555) 123-4567 or 555.987.6543, again (555) 123-4567")).toEqual([
      "(555) 123-4567",
      "555.987.6543",
    ]);
  });
});
