/** CIF 字段模型 - 组合根 */

import type { CoreSettings, DictionaryInfo, Result } from './src/types';
import { CifModelError, ok, safeErrorMessage, toErr } from './src/types';

// 数据层组件
import { SettingsStore } from './src/data/settings-store';
import { APP_LOG_FILE, FileStorage } from './src/data/file-storage';
import { Logger } from './src/data/logger';

// 应用层组件
import { DictionaryManager } from './src/core/dictionary-manager';
import type { DictionaryReader } from './src/core/dictionary-manager';
import { PrefixRegistry } from './src/core/registered-prefixes';
import { DataNameValidator } from './src/core/data-name-validator';
import { FormatConverter } from './src/core/format-converter';
import { FieldRulesValidator } from './src/core/field-rules-validator';

export * from './src/types';
export * from './src/data';
export * from './src/core';

const MODULE = 'CifFieldModel';

export interface CifFieldModelOptions {
	/** 数据目录：settings.json、日志与用户前缀表 */
	dataDir: string;
	/** 词典读取；缺省读本地文件 */
	reader?: DictionaryReader;
}

interface CifFieldModelParts {
	storage: FileStorage;
	logger: Logger;
	settingsStore: SettingsStore;
	prefixes: PrefixRegistry;
	dictionaries: DictionaryManager;
	dataNames: DataNameValidator;
	converter: FormatConverter;
	fieldRules: FieldRulesValidator;
}

function sameMembers(a: readonly string[], b: readonly string[]): boolean {
	const left = new Set(a);
	const right = new Set(b);
	return left.size === right.size && [...left].every(value => right.has(value));
}

/** 装配好的字段模型 */
export class CifFieldModel {
	readonly storage: FileStorage;
	readonly logger: Logger;
	readonly settingsStore: SettingsStore;
	readonly prefixes: PrefixRegistry;
	readonly dictionaries: DictionaryManager;
	readonly dataNames: DataNameValidator;
	readonly converter: FormatConverter;
	readonly fieldRules: FieldRulesValidator;

	private unsubscribers: Array<() => void> = [];

	private constructor(parts: CifFieldModelParts) {
		this.storage = parts.storage;
		this.logger = parts.logger;
		this.settingsStore = parts.settingsStore;
		this.prefixes = parts.prefixes;
		this.dictionaries = parts.dictionaries;
		this.dataNames = parts.dataNames;
		this.converter = parts.converter;
		this.fieldRules = parts.fieldRules;

		this.unsubscribers.push(
			this.settingsStore.subscribe(settings => this.applySettings(settings))
		);
	}

	/**
	 * 初始化顺序：
	 * 1. 数据目录
	 * 2. 日志
	 * 3. 设置
	 * 4. 前缀表
	 * 5. 主词典与额外词典
	 * 6. 转换与校验组件
	 */
	static async create(options: CifFieldModelOptions): Promise<Result<CifFieldModel>> {
		// 1. 初始化数据目录
		const storage = new FileStorage({ dataDir: options.dataDir });
		const initResult = await storage.initialize();
		if (!initResult.ok) return initResult;

		// 2. 日志（级别在设置加载后更新）
		const logger = new Logger(APP_LOG_FILE, storage);
		await logger.initialize();

		// 3. 加载设置
		const settingsStore = new SettingsStore({ storage, logger });
		const settingsResult = await settingsStore.load();
		if (!settingsResult.ok) {
			logger.warn(MODULE, '设置加载失败', { event: 'MODEL_INIT_ERROR', error: settingsResult.error });
			await logger.flush();
			return settingsResult;
		}
		const settings = settingsResult.value;
		logger.setLogLevel(settings.logLevel);

		// 4. 前缀表
		const prefixes = await PrefixRegistry.load(storage, logger);

		// 5. 词典
		let dictionaries: DictionaryManager;
		try {
			dictionaries = new DictionaryManager({
				primaryPath: settings.primaryDictionaryPath || undefined,
				reader: options.reader,
				logger,
				neverDeprecatedFields: settings.neverDeprecatedFields,
			});
		} catch (error) {
			if (error instanceof Error) {
				logger.error(MODULE, '主词典加载失败', error, { event: 'MODEL_INIT_ERROR' });
			}
			await logger.flush();
			return toErr(error);
		}
		CifFieldModel.loadAdditionalDictionaries(dictionaries, settings, logger);

		// 6. 转换与校验
		const dataNames = new DataNameValidator({
			manager: dictionaries,
			prefixes,
			preferences: settingsStore,
			logger,
		});
		dataNames.initialize();

		const model = new CifFieldModel({
			storage,
			logger,
			settingsStore,
			prefixes,
			dictionaries,
			dataNames,
			converter: new FormatConverter(dictionaries, logger, settings.conversion),
			fieldRules: new FieldRulesValidator(dictionaries, logger),
		});

		logger.info(MODULE, 'CIF 字段模型初始化完成', {
			event: 'MODEL_INIT_COMPLETE',
			dictionaries: dictionaries.getDictionaryInfo().length,
			prefixSource: prefixes.getSource(),
		});
		return ok(model);
	}

	/** 按设置顺序加载额外词典；单个失败只记录日志 */
	private static loadAdditionalDictionaries(
		dictionaries: DictionaryManager,
		settings: CoreSettings,
		logger: Logger
	): void {
		for (const entry of settings.additionalDictionaries) {
			try {
				const info = dictionaries.addDictionary(entry.path);
				if (!entry.active) {
					dictionaries.setDictionaryActive(info.id, false);
				}
			} catch (error) {
				logger.warn(MODULE, '额外词典加载失败，已跳过', {
					event: 'ADDITIONAL_DICTIONARY_SKIPPED',
					path: entry.path,
					code: error instanceof CifModelError ? error.code : 'E500_INTERNAL_ERROR',
					reason: safeErrorMessage(error, '词典读取失败'),
				});
			}
		}
	}

	// ==========================================================================
	// 词典集合（变更写回设置）
	// ==========================================================================

	async addDictionary(path: string): Promise<Result<DictionaryInfo>> {
		let info: DictionaryInfo;
		try {
			info = this.dictionaries.addDictionary(path);
		} catch (error) {
			return toErr(error);
		}
		const saved = await this.persistDictionaries();
		return saved.ok ? ok(info) : saved;
	}

	async removeDictionary(id: string): Promise<Result<void>> {
		const removed = this.dictionaries.removeDictionary(id);
		if (!removed.ok) return removed;
		return this.persistDictionaries();
	}

	async setDictionaryActive(id: string, active: boolean): Promise<Result<void>> {
		const changed = this.dictionaries.setDictionaryActive(id, active);
		if (!changed.ok) return changed;
		return this.persistDictionaries();
	}

	/** 只记录来自文件的额外词典；URL 词典不跨会话保留 */
	private async persistDictionaries(): Promise<Result<void>> {
		const additionalDictionaries = this.dictionaries
			.getDictionaryInfo()
			.filter(info => !info.isPrimary && info.sourceType === 'file')
			.map(info => ({ path: info.path, active: info.isActive }));
		return this.settingsStore.updateSettings({ additionalDictionaries });
	}

	// ==========================================================================
	// 生命周期
	// ==========================================================================

	private applySettings(settings: CoreSettings): void {
		this.logger.setLogLevel(settings.logLevel);
		this.converter.setOptions(settings.conversion);
		const { allowedPrefixes, allowedFields } = settings.dataNames;
		if (
			!sameMembers(allowedPrefixes, this.dataNames.getAllowedPrefixes()) ||
			!sameMembers(allowedFields, this.dataNames.getAllowedFields())
		) {
			this.dataNames.initialize();
		}
	}

	/** 解除订阅并等待日志写盘 */
	async dispose(): Promise<void> {
		for (const unsubscribe of this.unsubscribers) {
			unsubscribe();
		}
		this.unsubscribers = [];
		this.dataNames.dispose();
		this.logger.info(MODULE, 'CIF 字段模型已释放', { event: 'MODEL_DISPOSED' });
		await this.logger.flush();
	}
}
