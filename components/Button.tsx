import React from 'react';

interface ButtonProps extends React.ButtonHTMLAttributes<HTMLButtonElement> {
  variant?: 'primary' | 'secondary' | 'danger' | 'ghost';
  icon?: React.ReactNode;
  /** Highlights the currently selected tool. */
  active?: boolean;
  shortcut?: string;
}

const VARIANTS = {
  primary: 'bg-indigo-600 hover:bg-indigo-500 text-white shadow-lg shadow-indigo-500/30',
  secondary: 'bg-slate-700 hover:bg-slate-600 text-slate-100 border border-slate-600',
  danger: 'bg-red-500/10 hover:bg-red-500/20 text-red-400 border border-red-500/50',
  ghost: 'bg-transparent hover:bg-white/5 text-slate-400 hover:text-white'
};

export const Button: React.FC<ButtonProps> = ({
  children,
  variant = 'secondary',
  icon,
  className = '',
  active = false,
  shortcut,
  type = 'button',
  ...props
}) => {
  const baseStyles = 'flex items-center gap-2 px-3 py-1.5 rounded-lg text-xs font-medium transition-all duration-200 disabled:opacity-50 disabled:cursor-not-allowed';
  const activeStyle = active ? 'ring-2 ring-indigo-400 ring-offset-2 ring-offset-slate-900 bg-slate-800' : '';

  return (
    <button
      type={type}
      aria-pressed={active || undefined}
      className={`${baseStyles} ${VARIANTS[variant]} ${activeStyle} ${className}`}
      {...props}
    >
      {icon && <span className="w-4 h-4 shrink-0 flex items-center">{icon}</span>}
      <span className="flex-1 text-left truncate">{children}</span>
      {shortcut && <kbd className="text-[9px] font-mono text-slate-500 border border-slate-600 rounded px-1">{shortcut}</kbd>}
    </button>
  );
};
