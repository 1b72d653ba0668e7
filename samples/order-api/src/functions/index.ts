export { CreateOrder, CreateOrderRequest } from "./create-order";
export { GetOrder, OrderByIdRequest } from "./get-order";
export { ListOrders, ListOrdersRequest } from "./list-orders";
export { CancelOrder } from "./cancel-order";
