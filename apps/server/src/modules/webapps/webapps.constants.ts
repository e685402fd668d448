export const WEBAPP_ENTRIES = "WEBAPP_ENTRIES";
