/**
 * Mock transport exports for testing
 */

export {
	createMockTransport,
	type MockHandler,
	type MockReply,
	type MockTransport,
	type MockTransportOptions,
	NO_ROUTE,
	routeKey,
} from "./fixture.ts";
