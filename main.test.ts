/**
 * CifFieldModel 组合根测试
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { CifFieldModel } from './main';
import { APP_LOG_FILE, DEFAULT_SETTINGS, Logger, SETTINGS_FILE } from './src/data';
import type { Result } from './src/types';
import { buildDdlmDictionary, cleanupTempDir, createTempDir } from './src/test-utils';

const POWDER = buildDdlmDictionary('CIF_POW', [{ id: '_pd_phase.name', aliases: ['_pd_phase_name'] }]);

function unwrap<T>(result: Result<T>): T {
	if (!result.ok) {
		throw new Error(`${result.error.code}: ${result.error.message}`);
	}
	return result.value;
}

describe('CifFieldModel', () => {
	let dataDir: string;
	let powderPath: string;

	const readSettings = (): unknown => JSON.parse(fs.readFileSync(path.join(dataDir, SETTINGS_FILE), 'utf-8'));
	const writeSettings = (data: unknown) =>
		fs.writeFileSync(path.join(dataDir, SETTINGS_FILE), JSON.stringify(data));
	const loggedEvents = () =>
		fs
			.readFileSync(path.join(dataDir, APP_LOG_FILE), 'utf-8')
			.split('\n')
			.filter(line => line)
			.map(line => Logger.parseLogEntry(line)?.event);

	beforeEach(() => {
		dataDir = createTempDir('model');
		powderPath = path.join(dataDir, 'cif_pow.dic');
		fs.writeFileSync(powderPath, POWDER);
	});

	afterEach(() => {
		cleanupTempDir(dataDir);
	});

	it('首次创建写入默认设置并使用内置核心词典', async () => {
		const model = unwrap(await CifFieldModel.create({ dataDir }));

		expect(readSettings()).toEqual(DEFAULT_SETTINGS);
		const [primary] = model.dictionaries.getDictionaryInfo();
		expect(primary?.sourceType).toBe('bundled');
		expect(primary?.isPrimary).toBe(true);
		expect(model.prefixes.getSource()).toBe('bundled');
		expect(model.converter.convertToCif2('data_x\n_cell_length_a 5').content).toBe(
			'#\\#CIF_2.0\n\ndata_x\n_cell.length_a 5'
		);

		await model.dispose();
		expect(loggedEvents()).toContain('MODEL_INIT_COMPLETE');
		expect(loggedEvents()).toContain('MODEL_DISPOSED');
	});

	it('额外词典的加载与激活状态跨会话保留', async () => {
		const first = unwrap(await CifFieldModel.create({ dataDir }));
		const info = unwrap(await first.addDictionary(powderPath));
		expect(info.dictType).toBe('powder');
		expect(readSettings()).toMatchObject({ additionalDictionaries: [{ path: powderPath, active: true }] });

		unwrap(await first.setDictionaryActive('cif_pow.dic', false));
		expect(readSettings()).toMatchObject({ additionalDictionaries: [{ path: powderPath, active: false }] });
		await first.dispose();

		const second = unwrap(await CifFieldModel.create({ dataDir }));
		const reloaded = second.dictionaries.getDictionaryInfo().find(d => d.id === 'cif_pow.dic');
		expect(reloaded?.isActive).toBe(false);
		expect(second.dictionaries.isKnownField('_pd_phase_name')).toBe(false);

		unwrap(await second.removeDictionary('cif_pow.dic'));
		expect(readSettings()).toMatchObject({ additionalDictionaries: [] });
		await second.dispose();
	});

	it('词典操作失败时返回错误，设置不变', async () => {
		const model = unwrap(await CifFieldModel.create({ dataDir }));

		const missing = await model.addDictionary(path.join(dataDir, 'missing.dic'));
		expect(missing.ok ? null : missing.error.code).toBe('E301_FILE_NOT_FOUND');
		const primary = await model.removeDictionary('cif_core_minimal.dic');
		expect(primary.ok ? null : primary.error.code).toBe('E310_INVALID_STATE');
		expect(readSettings()).toMatchObject({ additionalDictionaries: [] });
		await model.dispose();
	});

	it('无法加载的额外词典被跳过', async () => {
		writeSettings({
			...DEFAULT_SETTINGS,
			additionalDictionaries: [
				{ path: path.join(dataDir, 'gone.dic'), active: true },
				{ path: powderPath, active: true },
			],
		});

		const model = unwrap(await CifFieldModel.create({ dataDir }));
		expect(model.dictionaries.getDictionaryInfo().map(d => d.id)).toEqual(['cif_core_minimal.dic', 'cif_pow.dic']);
		expect(model.dictionaries.isKnownField('_pd_phase_name')).toBe(true);

		await model.dispose();
		expect(loggedEvents()).toContain('ADDITIONAL_DICTIONARY_SKIPPED');
	});

	it('主词典无法读取时创建失败', async () => {
		writeSettings({ ...DEFAULT_SETTINGS, primaryDictionaryPath: path.join(dataDir, 'nope.dic') });

		const result = await CifFieldModel.create({ dataDir });
		expect(result.ok ? null : result.error.code).toBe('E301_FILE_NOT_FOUND');
	});

	it('可指定主词典', async () => {
		writeSettings({ ...DEFAULT_SETTINGS, primaryDictionaryPath: powderPath });

		const model = unwrap(await CifFieldModel.create({ dataDir }));
		const [primary] = model.dictionaries.getDictionaryInfo();
		expect(primary?.id).toBe('cif_pow.dic');
		expect(model.dictionaries.isKnownField('_cell_length_a')).toBe(false);
		await model.dispose();
	});

	it('设置变更同步到转换选项与日志级别', async () => {
		const model = unwrap(await CifFieldModel.create({ dataDir }));

		unwrap(
			await model.settingsStore.updateSettings({
				logLevel: 'warn',
				conversion: { ...DEFAULT_SETTINGS.conversion, deprecatedSection: false },
			})
		);
		expect(model.logger.getLogLevel()).toBe('warn');
		expect(model.converter.getOptions().deprecatedSection).toBe(false);
		await model.dispose();
	});

	it('数据名偏好跨会话保留，导入设置后重新读取', async () => {
		const first = unwrap(await CifFieldModel.create({ dataDir }));
		unwrap(await first.dataNames.addAllowedPrefix('mylab'));
		await first.dispose();

		const second = unwrap(await CifFieldModel.create({ dataDir }));
		expect(second.dataNames.validateField('_mylab_flag').category).toBe('user_allowed');

		unwrap(
			await second.settingsStore.importSettings(
				JSON.stringify({ ...DEFAULT_SETTINGS, dataNames: { allowedPrefixes: [], allowedFields: ['_foo_bar'] } })
			)
		);
		expect(second.dataNames.getAllowedPrefixes()).toEqual([]);
		expect(second.dataNames.validateField('_mylab_flag').category).toBe('unknown');
		expect(second.dataNames.validateField('_foo_bar').category).toBe('user_allowed');
		await second.dispose();
	});
});
