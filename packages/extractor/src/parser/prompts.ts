import type { ExtractionMode } from '../types';

export const FULL_PROMPT = [
  '你是发票识别专家。请识别图片中的发票，按JSON格式返回数据。',
  '',
  '价税合计金额（total）是最重要的字段，请在发票下方查找「价税合计」「合计」或「总金额」。',
  '',
  '字段：',
  '- total: 价税合计，仅数字，如1234.56',
  '- invoice_no: 发票号码',
  '- issue_date: 开票日期，格式YYYY-MM-DD',
  '- seller: 销售方名称',
  '- buyer: 购买方名称',
  '- tax: 税额，仅数字，没有则为0',
  '- subtotal: 不含税金额，仅数字，没有则为0',
  '- items: 商品或服务名称，逗号分隔，最多3个',
  '',
  '只返回JSON：',
  '{"invoice_no": "", "issue_date": "YYYY-MM-DD", "seller": "", "buyer": "", "total": 0, "tax": 0, "subtotal": 0, "items": ""}',
  '',
  '无法识别的字段返回空字符串或0，不要猜测；如果不是发票，所有字段返回空或0。',
].join('\n');

export const SIMPLE_PROMPT = [
  '你是发票识别专家。请识别图片中发票的价税合计金额。',
  '只返回JSON：{"total": 数值}，金额仅数字，如1234.56。',
  '无法识别时返回 {"total": 0}，不要输出其他内容。',
].join('\n');

export const VALIDATE_PROMPT = [
  '请判断图片中的文件是否是发票。',
  '是发票（增值税专用发票、普通发票、电子发票等）返回 {"is_invoice": true}',
  '不是发票（行程单、收据等）返回 {"is_invoice": false}',
  '不要输出其他内容。',
].join('\n');

export const CLASSIFY_PROMPT = [
  '请识别这张发票的类型和费用类别，只返回JSON。',
  '',
  '发票类型 invoice_type：special_vat 增值税专用发票, general_vat 增值税普通发票, electronic 电子发票,',
  'toll 通行费发票, taxi 出租车发票, train 火车票, flight 机票行程单, other 其他类型',
  '',
  '费用类别 expense_category：travel 差旅, dining 餐饮, office 办公用品, transport 交通, telecom 通讯,',
  'conference 会议, training 培训, service 服务费, material 材料/设备, other 其他',
  '',
  '{"invoice_type": "", "invoice_type_name": "", "expense_category": "", "expense_category_name": ""}',
].join('\n');

export const VERIFY_PROMPT = [
  '你是发票审核专家。请检查这张发票的完整性和真实性：',
  '印章是否清晰，发票号码是否完整，图片是否清晰，是否有修改痕迹，金额大小写是否一致。',
  '',
  '只返回JSON：',
  '{"risk_level": "low/medium/high", "has_stamp": true, "image_quality": "good/fair/poor", "risk_notes": ""}',
  '',
  'low：完整清晰无异常；medium：轻微问题，如图片模糊；high：无印章、有修改痕迹或金额不一致。',
].join('\n');

export function promptFor(mode: ExtractionMode): string {
  return mode === 'full' ? FULL_PROMPT : SIMPLE_PROMPT;
}
