export type LogObject = Record<string, unknown>;
export type LogFn = {
	(obj: LogObject, msg?: string): void;
	(msg: string): void;
};

export interface Logger {
	info: LogFn;
	error: LogFn;
	debug: LogFn;
	warn: LogFn;
}

const PREFIX = '[pagewright]';

const consoleLogger: Logger = {
	debug: (...args) => {
		console.debug(PREFIX, ...args);
	},

	info: (...args) => {
		console.log(PREFIX, ...args);
	},

	warn: (...args) => {
		console.warn(PREFIX, ...args);
	},

	error: (...args) => {
		console.error(PREFIX, ...args);
	},
};

export const silentLogger: Logger = {
	debug: () => undefined,
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
};

export default consoleLogger;
