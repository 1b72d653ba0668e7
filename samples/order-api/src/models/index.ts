export { Order } from "./order";
export type { OrderStatus } from "./order";
