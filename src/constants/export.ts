/**
 * Export projection schema
 *
 * Column definitions are the single source of truth for each sheet's
 * layout; headers and row order are derived from them.
 */

export const MESSAGES_SHEET_NAME = "Messages";
export const VACANCIES_SHEET_NAME = "Vacancies";
export const STATISTIC_SHEET_NAME = "Statistic";
export const SERVICE_SHEET_NAME = "Service";

export const MESSAGE_COLUMNS = [
  { id: "date", header: "Date/Time" },
  { id: "message_id", header: "Message ID" },
  { id: "message_type", header: "Type" },
  { id: "text", header: "Text" },
] as const;

export const VACANCY_COLUMNS = [
  { id: "message_id", header: "Message ID" },
  { id: "text_position", header: "Position" },
  { id: "company", header: "Company" },
  { id: "location", header: "Location" },
  { id: "text_experience", header: "Experience" },
  { id: "experience_years", header: "Experience (years)" },
  { id: "min_salary", header: "Min Salary" },
  { id: "max_salary", header: "Max Salary" },
  { id: "url", header: "URL" },
  { id: "subscription", header: "Subscription" },
  { id: "html_position", header: "Position (page)" },
  { id: "description", header: "Description" },
  { id: "lingvo", header: "Lingvo" },
  { id: "html_experience", header: "Experience (page)" },
  { id: "work_type", header: "Work Type" },
  { id: "candidate_locations", header: "Candidate Locations" },
  { id: "main_tech", header: "Main Technology" },
  { id: "tech_stack", header: "Tech Stack" },
  { id: "domain", header: "Domain" },
  { id: "company_type", header: "Company Type" },
  { id: "offices", header: "Offices" },
  { id: "notes", header: "Notes" },
  { id: "parsing_status", header: "parsing_status" },
] as const;

// Headers match the channel's own statistic digest
export const STATISTIC_COLUMNS = [
  { id: "date", header: "Дата" },
  { id: "message_id", header: "ID" },
  { id: "vacancies_in_30d", header: "Вак-ий за 30 дн." },
  { id: "candidates_online", header: "Канд-ты онлайн" },
  { id: "min_salary", header: "Мин. з/п" },
  { id: "max_salary", header: "Макс. з/п" },
  { id: "responses_to_vacancies", header: "Откл-ов на 1 вак." },
  { id: "vacancies_per_week", header: "Вак. за нед." },
  { id: "candidates_per_week", header: "Канд-ов за нед." },
] as const;

export const SERVICE_COLUMNS = [
  { id: "message_id", header: "Message ID" },
  { id: "text", header: "Command" },
] as const;

/**
 * Placeholder for absent values
 */
export const EMPTY_CELL = "";
