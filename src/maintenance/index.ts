/**
 * Maintenance module barrel exports
 */

export * from "./reconcileVacancyWeb";
export * from "./backupSource";
