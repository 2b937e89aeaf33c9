/**
 * Vacancy page field extraction
 *
 * Reads a fetched vacancy page with cheerio using the class selectors
 * from the sign registry:
 * - heading (position) and description block
 * - job card list items, each assigned to at most one field by sign
 * - technology tokens scanned from the description
 */

import * as cheerio from "cheerio";
import type {
  FetchResult,
  HtmlFields,
  HtmlSignField,
  SignRegistry,
} from "@/types";
import { findFirstSign } from "../signMatching";
import { collapseSpaces } from "@/utils/text/textNormalization";
import { htmlToText } from "@/utils/text/htmlToText";
import { scanTechTokens, pickMainTech } from "./techTokens";

type HtmlTextFieldKey =
  | "lingvo"
  | "htmlExperience"
  | "workType"
  | "domain"
  | "companyType"
  | "offices";

const FIELD_KEYS: Record<HtmlSignField, HtmlTextFieldKey> = {
  lingvo: "lingvo",
  experience: "htmlExperience",
  work_type: "workType",
  domain: "domain",
  company_type: "companyType",
  offices: "offices",
};

function nonEmpty(text: string): string | undefined {
  const collapsed = collapseSpaces(text);
  return collapsed.length > 0 ? collapsed : undefined;
}

/**
 * Assign card items to fields.
 *
 * Steps per item:
 * 1. Candidate-location marker: the text after it is the value
 * 2. Field sign sets in configured order; first match only
 * 3. Otherwise (or when the field is already set) the item is a note
 */
function assignCardItems(
  items: string[],
  registry: SignRegistry,
): Pick<HtmlFields, HtmlTextFieldKey | "candidateLocations" | "notes"> {
  const fields: Pick<HtmlFields, HtmlTextFieldKey | "candidateLocations"> = {};
  const notes: string[] = [];

  for (const item of items) {
    const marker = findFirstSign(item, registry.html.candidateLocations);
    if (marker) {
      const value = nonEmpty(item.slice(marker.index + marker.text.length));
      if (value !== undefined && fields.candidateLocations === undefined) {
        fields.candidateLocations = value;
      } else {
        notes.push(item);
      }
      continue;
    }

    let assigned = false;
    for (const entry of registry.html.fields) {
      const match = findFirstSign(item, entry.signs);
      if (!match) {
        continue;
      }

      const key = FIELD_KEYS[entry.field];
      const value = entry.stripSign
        ? nonEmpty(
            item.slice(0, match.index) +
              item.slice(match.index + match.text.length),
          )
        : item;

      if (value !== undefined && fields[key] === undefined) {
        fields[key] = value;
        assigned = true;
      }
      break;
    }

    if (!assigned) {
      notes.push(item);
    }
  }

  return notes.length > 0 ? { ...fields, notes } : fields;
}

/**
 * Extract fields from page markup.
 *
 * @param html - Page HTML
 * @param registry - Compiled sign registry (selectors, field signs, tech tokens)
 * @returns Resolved fields only
 */
export function extractHtmlFieldsFromMarkup(
  html: string,
  registry: SignRegistry,
): HtmlFields {
  const { selectors } = registry.html;
  const $ = cheerio.load(html);

  const fields: HtmlFields = {};

  const position = nonEmpty($(selectors.position).first().text());
  if (position !== undefined) {
    fields.htmlPosition = position;
  }

  const descriptionBlock = $(selectors.description).first();
  if (descriptionBlock.length > 0) {
    const description = htmlToText(descriptionBlock.html() ?? "");
    if (description.length > 0) {
      fields.description = description;
    }
  }

  const items: string[] = [];
  $(selectors.card)
    .first()
    .find(selectors.list)
    .find(selectors.item)
    .each((_, element) => {
      const text = nonEmpty($(element).text());
      if (text !== undefined) {
        items.push(text);
      }
    });
  Object.assign(fields, assignCardItems(items, registry));

  if (fields.description !== undefined) {
    const techStack = scanTechTokens(fields.description, registry.techTokens);
    const mainTech = pickMainTech(techStack);
    if (mainTech !== undefined) {
      fields.mainTech = mainTech;
      fields.techStack = techStack;
    }
  }

  return fields;
}

/**
 * Extract fields from a link-follow result.
 *
 * A failed fetch (non-success status, transport error, timeout, error
 * page) yields no fields at all.
 */
export function extractHtmlFields(
  page: FetchResult | null,
  registry: SignRegistry,
): HtmlFields {
  if (page === null || !page.ok) {
    return {};
  }
  return extractHtmlFieldsFromMarkup(page.html, registry);
}
