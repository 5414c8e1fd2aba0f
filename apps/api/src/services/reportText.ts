import type { DrawResult } from '@comidas/shared';

const RULE = '='.repeat(50);
const THIN_RULE = '-'.repeat(30);

const byNameInsensitive = (left: string, right: string): number =>
  left.toLowerCase().localeCompare(right.toLowerCase());

const formatDelta = (size: number, targetCeiling: number): string => {
  const delta = size - targetCeiling;
  if (delta === 0) return '(✓)';
  return delta > 0 ? `(+${delta})` : `(${delta})`;
};

/** Plain-text summary meant to be pasted into a chat. */
export const renderDrawReport = (result: DrawResult, seed: string | number): string => {
  const participants = Object.keys(result.assignment).sort(byNameInsensitive);
  const lines: string[] = [
    '🍽️ RESULTADOS DEL SORTEO DE COMIDAS',
    RULE,
    `🌱 Semilla utilizada: ${seed}`,
    RULE,
    '',
    `👥 PARTICIPANTES: ${participants.length} personas`,
    `Participantes: ${participants.join(', ')}`,
    '',
    '📊 RESUMEN DE GRUPOS:',
  ];

  for (const group of result.groups) {
    lines.push(`• ${group.id}: ${group.size} personas ${formatDelta(group.size, group.targetCeiling)}`);
  }

  lines.push('', '🍽️ ASIGNACIONES FINALES:', THIN_RULE);

  for (const group of result.groups) {
    lines.push('', `${group.id.toUpperCase()}:`);
    for (const member of [...group.members].sort(byNameInsensitive)) {
      lines.push(`  • ${member}`);
    }
  }

  if (result.warnings.length > 0) {
    lines.push('', '⚠️ GRUPOS POR ENCIMA DEL OBJETIVO:');
    for (const warning of result.warnings) {
      lines.push(`• ${warning.groupId}: ${warning.size} personas, objetivo ${warning.targetCeiling} (+${warning.overflow})`);
    }
  }

  lines.push(
    '',
    RULE,
    `📈 Estadísticas: Desviación=${result.stats.totalDeviation}, Diferencia máx=${result.stats.maxSpread}`,
  );

  return lines.join('\n');
};
