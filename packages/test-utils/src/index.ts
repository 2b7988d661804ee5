export {
	assertAccountBalance,
	assertBalancesConserved,
	assertTransferPair,
} from "./assertions.js";
export {
	getTestInstance,
	sequentialIds,
	type TestInstance,
	type TestInstanceOptions,
} from "./get-test-instance.js";
