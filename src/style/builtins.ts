/**
 * Builtin Templates — complete style configurations shipped with the tool.
 *
 * default:  GB/T 9704-2012 official document layout
 * formal:   business correspondence
 * academic: thesis / paper layout
 */

import type { StyleConfiguration } from "./schema.js";

export const BUILTIN_TEMPLATE_NAMES = ["default", "formal", "academic"] as const;

export type BuiltinTemplateName = (typeof BUILTIN_TEMPLATE_NAMES)[number];

export interface TemplateDefinition {
  name: BuiltinTemplateName;
  /** Label shown in template pickers. */
  label: string;
  description: string;
  config: StyleConfiguration;
}

const DEFAULT_CONFIG: StyleConfiguration = {
  document: {
    margin_top: 3.7,
    margin_bottom: 3.5,
    margin_left: 2.8,
    margin_right: 2.6,
    line_spacing: 1.5,
    font_family: "仿宋_GB2312",
    font_size: 16,
  },
  title: { font_family: "黑体", font_size: 22, bold: true, alignment: "center" },
  heading1: { font_family: "黑体", font_size: 16, bold: true, alignment: "left" },
  heading2: { font_family: "楷体_GB2312", font_size: 15, bold: false, alignment: "left" },
  body: {
    font_family: "仿宋_GB2312",
    font_size: 16,
    bold: false,
    alignment: "left",
    first_line_indent: 2,
  },
  signature: { font_family: "仿宋_GB2312", font_size: 16, bold: false, alignment: "right" },
};

const FORMAL_CONFIG: StyleConfiguration = {
  document: {
    margin_top: 2.5,
    margin_bottom: 2.5,
    margin_left: 3.0,
    margin_right: 2.5,
    line_spacing: 1.5,
    font_family: "宋体",
    font_size: 14,
  },
  title: { font_family: "黑体", font_size: 20, bold: true, alignment: "center" },
  heading1: { font_family: "黑体", font_size: 16, bold: true, alignment: "left" },
  heading2: { font_family: "宋体", font_size: 14, bold: true, alignment: "left" },
  body: {
    font_family: "宋体",
    font_size: 14,
    bold: false,
    alignment: "left",
    first_line_indent: 2,
  },
  signature: { font_family: "宋体", font_size: 14, bold: false, alignment: "right" },
};

const ACADEMIC_CONFIG: StyleConfiguration = {
  document: {
    margin_top: 2.5,
    margin_bottom: 2.5,
    margin_left: 3.0,
    margin_right: 2.5,
    line_spacing: 2,
    font_family: "宋体",
    font_size: 12,
  },
  title: { font_family: "黑体", font_size: 18, bold: true, alignment: "center" },
  heading1: { font_family: "黑体", font_size: 15, bold: true, alignment: "left" },
  heading2: { font_family: "黑体", font_size: 14, bold: true, alignment: "left" },
  body: {
    font_family: "宋体",
    font_size: 12,
    bold: false,
    alignment: "justify",
    first_line_indent: 2,
  },
  signature: { font_family: "宋体", font_size: 12, bold: false, alignment: "right" },
};

export const BUILTIN_TEMPLATES: readonly TemplateDefinition[] = [
  {
    name: "default",
    label: "默认公文格式 (GB/T 9704-2012)",
    description: "Chinese official document layout: 仿宋 body, 黑体 headings, wide margins.",
    config: DEFAULT_CONFIG,
  },
  {
    name: "formal",
    label: "正式商务文书",
    description: "Business correspondence: 宋体 14pt body, bold headings, 2.5cm margins.",
    config: FORMAL_CONFIG,
  },
  {
    name: "academic",
    label: "学术论文格式",
    description: "Academic paper: 宋体 12pt justified body, double line spacing.",
    config: ACADEMIC_CONFIG,
  },
];
