import { forwardRef, type CSSProperties, type HTMLAttributes, type ReactNode } from 'react';

type CardVariant = 'default' | 'accent';

interface CardProps extends HTMLAttributes<HTMLDivElement> {
  variant?: CardVariant;
  header?: ReactNode;
}

const variantStyles: Record<CardVariant, CSSProperties> = {
  default: {
    background: 'var(--bg-card-solid)',
    border: '1px solid var(--border)',
  },
  accent: {
    background: 'linear-gradient(145deg, var(--accent-dim) 0%, var(--bg-card-solid) 50%)',
    border: '1px solid var(--border-accent)',
    borderLeft: '3px solid var(--accent)',
  },
};

export const Card = forwardRef<HTMLDivElement, CardProps>(
  ({ variant = 'default', header, className = '', children, style, ...rest }, ref) => (
    <div
      ref={ref}
      className={`p-4 sm:p-5 ${className}`}
      style={{ borderRadius: 'var(--radius-xl)', ...variantStyles[variant], ...style }}
      {...rest}
    >
      {header && (
        <div className="mb-4 pb-3" style={{ borderBottom: '1px solid var(--border)' }}>
          {header}
        </div>
      )}
      {children}
    </div>
  )
);
Card.displayName = 'Card';
