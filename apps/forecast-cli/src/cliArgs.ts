export type ArgValue = string | boolean;

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token || token === "--") {
			continue;
		}
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			args[key] = value;
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
	if (positionals.length > 1) {
		throw new Error(`Unexpected argument: ${positionals[1]}`);
	}
	// A bare path reads the series from that file.
	const [filePath] = positionals;
	if (filePath !== undefined) {
		if (args.file !== undefined) {
			throw new Error(
				`Series file given twice: ${filePath} and --file ${String(args.file)}`
			);
		}
		args.file = filePath;
		if (args.source === undefined) {
			args.source = "file";
		}
	}
	return args;
};

export const readStringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string" || !value.length) {
		throw new Error(`Missing value for --${key}`);
	}
	return value;
};

export const readNumberArg = (
	args: Record<string, ArgValue>,
	key: string
): number | undefined => {
	const value = readStringArg(args, key);
	if (value === undefined) {
		return undefined;
	}
	const num = Number(value);
	if (!Number.isFinite(num)) {
		throw new Error(`Invalid numeric value for --${key}: ${value}`);
	}
	return num;
};

export const readFlag = (
	args: Record<string, ArgValue>,
	key: string
): boolean => args[key] === true || args[key] === "true";
