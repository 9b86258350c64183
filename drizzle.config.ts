import { defineConfig } from "drizzle-kit";
import { settings } from "./src/config/settings";

export default defineConfig({
	schema: "./src/db/schema.ts",
	out: "./src/db/migrations",
	dialect: "sqlite",
	dbCredentials: {
		url: settings.database.path,
	},
});
