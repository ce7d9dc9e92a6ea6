/**
 * @file template-engine-helper.ts
 * @description 模板引擎辅助函数注册。
 * 集中管理所有 Handlebars 模板使用的自定义 Helper 函数。
 */

import Handlebars from 'handlebars';

/**
 * Register global Handlebars helpers. Safe to call more than once.
 *
 * 注册全局模板辅助函数。
 */
export function registerTemplateEngineHelpers(): void {
	// 从 0 开始的序号转为从 1 开始的展示序号
	Handlebars.registerHelper('inc', function (value: unknown) {
		return typeof value === 'number' ? value + 1 : value;
	});
}
