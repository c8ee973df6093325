export const en = {
	"cli.usage": "Usage: news-stemmer <command> [options]",
	"cli.commands": "Commands:",
	"cli.command.stem": "  stem <word...>              Print the stem of each word",
	"cli.command.compare": "  compare <word...>           Compare stems with the Snowball reference stemmer",
	"cli.command.classify":
		"  classify --train <file> --test <file> --output <file> [--config <file>] [--quiet]",
	"cli.command.classify-description": "                              Build vocabularies and label each test line",
	"cli.command.help": "  help                        Show this message",
	"cli.unknown-command": "Unknown command: {command}",
	"cli.missing-words": "No words given.",
	"cli.missing-option": "Missing required option --{option}.",
	"cli.missing-value": "Option --{option} needs a value.",
	"cli.unknown-option": "Unknown option: {option}",
	"cli.error": "Error: {message}",
	"classify.progress": "Classified {index} of {total}",
	"classify.done": "Trained on {trained} documents, classified {classified}. Labels written to {output}.",
	"classify.vocabulary": "  {category}: {size} stems",
	"compare.summary": "{agreed} of {total} stems agree ({percent}%)",
};
