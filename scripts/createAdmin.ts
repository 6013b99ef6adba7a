#!/usr/bin/env node

/**
 * Provision the administrator account
 * Usage: npm run admin:create
 * Reads ADMIN_USERNAME / ADMIN_EMAIL / ADMIN_PASSWORD, prompting for anything missing.
 */

import readline from "readline";

import { createDatabase } from "../src/config/database.ts";
import { loadConfig } from "../src/config/env.ts";
import { loadEnvFile } from "../src/config/loadEnv.ts";
import { emailValidationSchema, passwordValidationSchema } from "../src/config/zodSchemas.ts";
import { DrizzleUserRepository } from "../src/repositories/drizzle/userRepository.ts";
import { seedAdmin } from "../src/services/users/seedAdmin.ts";
import { createPasswordHasher } from "../src/utils/hashingTools.ts";

const rl = readline.createInterface({
	input: process.stdin,
	output: process.stdout,
});

function question(query: string): Promise<string> {
	return new Promise((resolve) => rl.question(query, resolve));
}

async function createAdmin() {
	console.log("=== Create Administrator ===\n");

	loadEnvFile();
	const config = loadConfig();

	const username = config.adminSeed?.username ?? (await question("Enter username: ")).trim();
	if (username.length < 3) {
		console.error("Username must be at least 3 characters");
		process.exit(1);
	}

	const email = config.adminSeed?.email ?? (await question("Enter email: ")).trim();
	if (!emailValidationSchema.safeParse(email).success) {
		console.error("Invalid email address");
		process.exit(1);
	}

	let password = config.adminSeed?.password;
	if (!password) {
		password = await question("Enter password (min 8 chars): ");
		const confirmPassword = await question("Confirm password: ");
		if (password !== confirmPassword) {
			console.error("Passwords do not match");
			process.exit(1);
		}
	}
	if (!passwordValidationSchema.safeParse(password).success) {
		console.error("Password must be between 8 and 72 characters");
		process.exit(1);
	}

	rl.close();

	console.log("\nCreating administrator...");

	try {
		const users = new DrizzleUserRepository(createDatabase(config.storage.databaseUrl));
		const hasher = createPasswordHasher(config.auth.hashingSaltRounds);
		const { created, user } = await seedAdmin(users, hasher, { username, email, password });

		if (!created) {
			console.error(`Error: User ${user.username} already exists`);
			process.exit(1);
		}

		console.log("\n✅ Administrator created successfully!");
		console.log("Username:", user.username);
		console.log("Email:", user.email);
		console.log("Role:", user.role);

		process.exit(0);
	} catch (error) {
		console.error("Error creating administrator:", error);
		process.exit(1);
	}
}

createAdmin().catch((error: unknown) => {
	console.error(error);
	process.exit(1);
});
