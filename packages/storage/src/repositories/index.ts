export { RecordsRepository } from "./records.js";
export { UsersRepository } from "./users.js";
export { WorkplacesRepository } from "./workplaces.js";
