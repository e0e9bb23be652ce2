export * from "./models.js";
export * from "./database.js";
export * from "./supabase.js";
