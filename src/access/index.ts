export { AccessGuard, type AccessGuardOptions } from "./guard.js";
