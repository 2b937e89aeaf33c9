/**
 * Vacancy message text extraction
 *
 * Digest vacancy messages follow a loose layout:
 *
 *   **Python Developer** в Acme Corp
 *   Remote, 2 роки досвіду, $2000-3000
 *   https://jobs.example.com/jobs/101-python-developer/
 *
 *   __Підписка:__ "Python"
 *
 * The splitter divides the body from the subscription section. Fields
 * that cannot be located are left absent.
 */

import type { SignRegistry, VacancyTextFields } from "@/types";
import { findFirstSign, findLeftmostSign } from "../signMatching";
import {
  cleanQuoted,
  cleanValue,
  stripMarkup,
  toLines,
} from "@/utils/text/textNormalization";
import { toNumeric } from "@/utils/numeric";

export interface VacancyTextParts {
  body: string;
  /** Text from the splitter onward; empty when no splitter was found */
  section: string;
}

type LocationExperience = Pick<
  VacancyTextFields,
  "location" | "textExperience" | "experienceYears" | "salaryText"
>;

/**
 * Split a message at the leftmost splitter occurrence
 */
export function splitVacancyText(
  text: string,
  registry: SignRegistry,
): VacancyTextParts {
  const splitter = findLeftmostSign(text, registry.vacancyText.splitter);
  if (!splitter) {
    return { body: text, section: "" };
  }
  return {
    body: text.slice(0, splitter.index),
    section: text.slice(splitter.index),
  };
}

/**
 * Position and company from the heading line.
 *
 * The leftmost separator sign splits the line; with none, neither
 * field is resolved.
 */
export function extractPositionCompany(
  line: string,
  registry: SignRegistry,
): Pick<VacancyTextFields, "position" | "company"> {
  const heading = stripMarkup(line);
  const separator = findLeftmostSign(heading, registry.vacancyText.positionCompany);
  if (!separator) {
    return {};
  }

  const position = cleanValue(heading.slice(0, separator.index));
  const company = cleanValue(
    heading.slice(separator.index + separator.text.length),
  );

  return {
    ...(position !== undefined ? { position } : {}),
    ...(company !== undefined ? { company } : {}),
  };
}

/**
 * Location, experience and the salary tail from one body line.
 *
 * Steps:
 * 1. Locate the experience sign
 * 2. A number directly before it is the experience in years;
 *    otherwise the group's fixed value applies
 * 3. Text before the experience phrase is the location
 * 4. Text after it is handed on as the salary text
 */
function parseExperienceLine(
  line: string,
  signIndex: number,
  signLength: number,
  fixedYears: number | null,
  registry: SignRegistry,
): LocationExperience {
  const beforeSign = line.slice(0, signIndex).trimEnd();
  const numeric = registry.salary.trailingNumeric.exec(beforeSign);

  const experienceStart = numeric ? numeric.index : signIndex;
  const parsedYears = numeric ? toNumeric(numeric[1]) : null;
  const experienceYears = parsedYears ?? fixedYears;
  const signEnd = signIndex + signLength;

  const location = cleanValue(line.slice(0, experienceStart), ",");
  const textExperience = cleanValue(line.slice(experienceStart, signEnd));
  const salaryText = cleanValue(line.slice(signEnd), ",");

  return {
    ...(location !== undefined ? { location } : {}),
    ...(textExperience !== undefined ? { textExperience } : {}),
    ...(experienceYears !== null ? { experienceYears } : {}),
    ...(salaryText !== undefined ? { salaryText } : {}),
  };
}

/**
 * Find the location/experience line among the body lines.
 *
 * Experience groups are tested in configured order (group, then sign);
 * for each sign the first line containing it wins. Without any
 * experience sign, the first line (the one under the heading) is still
 * handed on as the salary text unless it is a link.
 */
export function extractLocationExperience(
  lines: string[],
  registry: SignRegistry,
): LocationExperience {
  for (const group of registry.vacancyText.experience) {
    for (const sign of group.signs) {
      for (const line of lines) {
        const match = sign.pattern.exec(line);
        if (match) {
          return parseExperienceLine(
            line,
            match.index,
            match[0].length,
            group.years,
            registry,
          );
        }
      }
    }
  }

  const [firstLine] = lines;
  if (firstLine === undefined || registry.url.test(firstLine)) {
    return {};
  }
  const salaryText = cleanValue(firstLine, ",");
  return salaryText !== undefined ? { salaryText } : {};
}

/**
 * First URL in the message, without trailing punctuation or markup
 */
export function extractUrl(
  text: string,
  registry: SignRegistry,
): string | undefined {
  const match = registry.url.exec(text);
  if (!match) {
    return undefined;
  }
  const url = match[0].replace(/[.,;:!*_`]+$/, "");
  return url.length > 0 ? url : undefined;
}

/**
 * Subscription name from the section after the splitter.
 *
 * The first matching subscription sign wins. A sign with a capture
 * group yields the group, otherwise the whole match.
 */
export function extractSubscription(
  section: string,
  registry: SignRegistry,
): string | undefined {
  if (section.length === 0) {
    return undefined;
  }
  const match = findFirstSign(section, registry.vacancyText.subscription);
  if (!match) {
    return undefined;
  }
  return cleanQuoted(match.group ?? match.text);
}

/**
 * Extract every text field of a vacancy message.
 *
 * @param text - Raw message text
 * @param registry - Compiled sign registry
 * @returns Resolved fields only; nothing is set to an empty string
 *
 * @example
 * extractVacancyText("Python Developer в Acme Corp\nRemote, 2 роки досвіду", registry)
 * // { position: "Python Developer", company: "Acme Corp", location: "Remote",
 * //   textExperience: "2 роки досвіду", experienceYears: 2 }
 */
export function extractVacancyText(
  text: string,
  registry: SignRegistry,
): VacancyTextFields {
  const { body, section } = splitVacancyText(text, registry);
  const lines = toLines(body);

  const [heading, ...rest] = lines;
  const positionCompany =
    heading !== undefined ? extractPositionCompany(heading, registry) : {};
  const locationExperience = extractLocationExperience(rest, registry);
  const url = extractUrl(text, registry);
  const subscription = extractSubscription(section, registry);

  return {
    ...positionCompany,
    ...locationExperience,
    ...(url !== undefined ? { url } : {}),
    ...(subscription !== undefined ? { subscription } : {}),
  };
}
