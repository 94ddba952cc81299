const NATIONAL_EXAM_NUMBER = /^(\d+)([A-D])(\d+)$/;
const BACHELOR_EXAM_NUMBER = /^G\d{2}-[\d\-再]+-[A-D]-(\d+)$/;

type RequiredRange = { from: number; to: number; areas: readonly string[]; maxNumber: number };

// Sittings of the national exam and the area/number span of their required section.
const NATIONAL_REQUIRED_RANGES: readonly RequiredRange[] = [
  { from: 101, to: 102, areas: ['A', 'B'], maxNumber: 25 },
  { from: 103, to: 110, areas: ['A', 'C'], maxNumber: 35 },
  { from: 111, to: 118, areas: ['A', 'B', 'C', 'D'], maxNumber: 20 },
];

const BACHELOR_REQUIRED_MAX = 20;

export function isNationalExamRequired(questionNumber: string): boolean {
  const match = NATIONAL_EXAM_NUMBER.exec(questionNumber.trim());
  if (!match) return false;
  const sitting = Number.parseInt(match[1], 10);
  const area = match[2];
  const num = Number.parseInt(match[3], 10);

  const range = NATIONAL_REQUIRED_RANGES.find((entry) => sitting >= entry.from && sitting <= entry.to);
  if (!range) return false;
  return range.areas.includes(area) && num >= 1 && num <= range.maxNumber;
}

export function isBachelorExamRequired(questionNumber: string): boolean {
  const match = BACHELOR_EXAM_NUMBER.exec(questionNumber.trim());
  if (!match) return false;
  const num = Number.parseInt(match[1], 10);
  return num >= 1 && num <= BACHELOR_REQUIRED_MAX;
}

export function isRequiredQuestionNumber(questionNumber: string): boolean {
  return isNationalExamRequired(questionNumber) || isBachelorExamRequired(questionNumber);
}
