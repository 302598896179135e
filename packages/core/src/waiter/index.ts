export { Waiter, newWaiter } from "./waiter";
