import type { en } from "./en";

export const ru: Partial<typeof en> = {
	"cli.usage": "Использование: news-stemmer <команда> [параметры]",
	"cli.commands": "Команды:",
	"cli.command.stem": "  stem <слово...>             Вывести основу каждого слова",
	"cli.command.compare": "  compare <слово...>          Сравнить основы с эталонным стеммером Snowball",
	"cli.command.classify-description": "                              Построить словари и разметить каждую строку теста",
	"cli.command.help": "  help                        Показать эту справку",
	"cli.unknown-command": "Неизвестная команда: {command}",
	"cli.missing-words": "Не указаны слова.",
	"cli.missing-option": "Не указан обязательный параметр --{option}.",
	"cli.missing-value": "Параметру --{option} нужно значение.",
	"cli.unknown-option": "Неизвестный параметр: {option}",
	"cli.error": "Ошибка: {message}",
	"classify.progress": "Обработано {index} из {total}",
	"classify.done": "Обучено на {trained} документах, размечено {classified}. Метки записаны в {output}.",
	"classify.vocabulary": "  {category}: основ {size}",
	"compare.summary": "Совпало {agreed} из {total} основ ({percent}%)",
};
