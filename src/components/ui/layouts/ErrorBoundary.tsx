'use client';

import React, { Component, type ErrorInfo, type ReactNode } from 'react';

interface Props {
  children: ReactNode;
  fallback?: ReactNode;
  onError?: (error: Error, errorInfo: ErrorInfo) => void;
}

interface State {
  hasError: boolean;
  error: Error | null;
}

/**
 * Catches render errors below it and shows a fallback instead of a blank page.
 */
export class ErrorBoundary extends Component<Props, State> {
  constructor(props: Props) {
    super(props);
    this.state = { hasError: false, error: null };
  }

  static getDerivedStateFromError(error: Error): State {
    return { hasError: true, error };
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo): void {
    console.error('[ErrorBoundary] Caught error:', error, errorInfo);
    this.props.onError?.(error, errorInfo);
  }

  handleReset = (): void => {
    this.setState({ hasError: false, error: null });
  };

  render(): ReactNode {
    if (!this.state.hasError) {
      return this.props.children;
    }

    if (this.props.fallback) {
      return this.props.fallback;
    }

    return (
      <div className="min-h-screen bg-neutral-100 flex items-center justify-center p-4">
        <div className="max-w-md w-full bg-white rounded-2xl shadow-2xl p-8 border border-neutral-200 text-center">
          <h1 className="text-2xl font-bold text-neutral-800 mb-2">Something went wrong</h1>
          <p className="text-neutral-600 mb-4">The typing test hit an unexpected error.</p>

          {this.state.error && process.env.NODE_ENV === 'development' && (
            <p className="mb-6 p-4 bg-neutral-50 rounded-lg text-xs font-mono text-neutral-700 break-words">
              {this.state.error.toString()}
            </p>
          )}

          <button
            type="button"
            onClick={this.handleReset}
            className="w-full px-6 py-3 bg-neutral-800 text-white font-semibold rounded-lg hover:bg-neutral-700"
          >
            Try Again
          </button>
        </div>
      </div>
    );
  }
}
