import { USER_ROLES, type UserRole } from "@gatehouse/shared";
import { createServices } from "../context.js";

function isUserRole(value: string): value is UserRole {
  return USER_ROLES.some((r) => r === value);
}

/** Usage: set-role <email> [user|admin]. Grants admin when the role is omitted. */
async function setRole() {
  const [email, roleArg = "admin"] = process.argv.slice(2);
  if (!email || !isUserRole(roleArg)) {
    console.error("Usage: set-role <email> [user|admin]");
    process.exit(1);
  }

  const { pool, identity } = await createServices();
  try {
    const user = await identity.setRole(email, roleArg);
    console.log(`Role of ${user.email} is now ${user.role}`);
  } finally {
    pool.close();
  }
}

setRole().catch((err: unknown) => {
  console.error("Error setting role:", err instanceof Error ? err.message : err);
  process.exit(1);
});
