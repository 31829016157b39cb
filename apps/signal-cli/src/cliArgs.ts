export type ArgValue = string | boolean;

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	for (let i = 0; i < argv.length; i += 1) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			args[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	return args;
};

export const getStringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	return typeof value === "string" && value.length ? value : undefined;
};

export const getFlagArg = (
	args: Record<string, ArgValue>,
	key: string
): boolean => {
	const value = args[key];
	if (typeof value === "string") {
		return value.toLowerCase() !== "false";
	}
	return value === true;
};

export interface SignalCliOptions {
	profile?: string;
	configDir?: string;
	dataDir?: string;
	once: boolean;
	dryRun: boolean;
}

export const resolveCliOptions = (argv: string[]): SignalCliOptions => {
	const args = parseCliArgs(argv);
	return {
		profile: getStringArg(args, "profile"),
		configDir: getStringArg(args, "config-dir"),
		dataDir: getStringArg(args, "data-dir"),
		once: getFlagArg(args, "once"),
		dryRun: getFlagArg(args, "dry-run"),
	};
};
