export {
  type Brand,
  type UserId,
  type TenantId,
  type SessionId,
  type RequestId,
  type Timestamp,
  brand,
} from "./brand.js";
export { type Result, type Ok, type Err, ok, err } from "./result.js";
