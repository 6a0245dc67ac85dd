export { RateGate, RateGateRegistry, type RateGateOptions } from "./rate-gate.js";
export { runPoll, callWithTimeout, type PollOptions, type PollCall } from "./poller.js";
