import type { HTMLAttributes } from 'react';

/** One variant per signal label. */
export type BadgeVariant = 'buy' | 'sell' | 'hold' | 'none';

interface BadgeProps extends HTMLAttributes<HTMLSpanElement> {
  variant: BadgeVariant;
}

const variantStyles: Record<BadgeVariant, { bg: string; color: string; border: string }> = {
  buy: { bg: 'var(--success-dim)', color: 'var(--success)', border: 'rgba(14,203,129,0.25)' },
  sell: { bg: 'var(--danger-dim)', color: 'var(--danger)', border: 'rgba(246,70,93,0.25)' },
  hold: { bg: 'var(--bg-hover-strong)', color: 'var(--text-secondary)', border: 'var(--border)' },
  none: { bg: 'var(--warning-dim)', color: 'var(--warning)', border: 'rgba(252,213,53,0.25)' },
};

export function Badge({ variant, className = '', children, ...rest }: BadgeProps) {
  const s = variantStyles[variant];
  return (
    <span
      className={`inline-flex items-center px-2.5 py-1 rounded-md text-xs font-semibold tracking-wide ${className}`}
      style={{ background: s.bg, color: s.color, border: `1px solid ${s.border}` }}
      {...rest}
    >
      {children}
    </span>
  );
}
