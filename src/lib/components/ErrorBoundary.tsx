'use client';

import React, { Component, ErrorInfo, ReactNode } from 'react';
import Link from 'next/link';
import { logger } from '../utils/logger';

interface Props {
  children: ReactNode;
  fallback?: ReactNode;
  onError?: (error: Error, errorInfo: ErrorInfo) => void;
}

interface State {
  hasError: boolean;
  error?: Error;
  errorId?: string;
}

export class ErrorBoundary extends Component<Props, State> {
  public state: State = {
    hasError: false,
  };

  public static getDerivedStateFromError(error: Error): State {
    return {
      hasError: true,
      error,
      errorId: Math.random().toString(36).slice(2, 11)
    };
  }

  public componentDidCatch(error: Error, errorInfo: ErrorInfo) {
    logger.error('React Error Boundary caught error', {
      component: 'ErrorBoundary',
      errorId: this.state.errorId || 'unknown',
      componentStack: errorInfo.componentStack
    }, error);

    this.props.onError?.(error, errorInfo);
  }

  private handleRetry = () => {
    this.setState({ hasError: false, error: undefined, errorId: undefined });
  };

  public render() {
    if (this.state.hasError) {
      if (this.props.fallback) {
        return this.props.fallback;
      }

      return (
        <div className="min-h-screen flex items-center justify-center bg-gray-50">
          <div className="max-w-md w-full bg-white shadow-lg rounded-lg p-6">
            <h1 className="text-lg font-medium text-gray-900 mb-4">
              The knowledge tree could not be displayed
            </h1>

            <div className="mb-4">
              <p className="text-sm text-gray-600">
                {this.state.error?.message || 'An unexpected error occurred while rendering.'}
              </p>

              {this.state.errorId && (
                <p className="text-xs text-gray-500 mt-2">
                  Error ID: <code className="bg-gray-100 px-1 rounded">{this.state.errorId}</code>
                </p>
              )}
            </div>

            <button
              onClick={this.handleRetry}
              className="w-full bg-emerald-600 text-white px-4 py-2 rounded-md text-sm font-medium hover:bg-emerald-700 focus:outline-none focus:ring-2 focus:ring-emerald-500"
            >
              Try Again
            </button>

            <div className="mt-4">
              <Link
                href="/"
                className="block text-center text-sm text-emerald-700 hover:text-emerald-900"
              >
                Start a new topic
              </Link>
            </div>
          </div>
        </div>
      );
    }

    return this.props.children;
  }
}

// Hook version for functional components
export function useErrorHandler() {
  return (error: Error, errorInfo?: { componentStack?: string }) => {
    logger.error('Manual error report', {
      component: 'useErrorHandler',
      componentStack: errorInfo?.componentStack
    }, error);
  };
}
