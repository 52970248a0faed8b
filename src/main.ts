/**
 * Application Entry Point
 *
 * Registers one hard-coded user through the console-backed gateway.
 */

import { UserRecord } from "./core/domain/entities/user-record.js";
import { runRegistrationDemo } from "./main/registration-demo.js";

function bootstrap(): void {
  const user = UserRecord.create({
    id: 1,
    name: "Alice",
    email: "alice@example.com",
  });

  runRegistrationDemo(user);
}

try {
  bootstrap();
} catch (err) {
  console.error("💥 Bootstrap failed:", err);
  process.exit(1);
}
