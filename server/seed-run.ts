import { seedDatabase } from "./seed";

// seedDatabase logs its own failure before rethrowing
seedDatabase()
  .then(() => process.exit(0))
  .catch(() => process.exit(1));
