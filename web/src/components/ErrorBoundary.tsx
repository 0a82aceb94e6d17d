import { Component, type ReactNode, type ErrorInfo } from 'react';
import './ErrorBoundary.css';

interface Props {
  /** Fallback UI when an error occurs (overrides default) */
  fallback?: ReactNode;
  children: ReactNode;
  /** Label used in logs and details, e.g. 'OtpDemo' */
  scope?: string;
  /** Called when an error is caught */
  onError?: (error: Error, info: ErrorInfo) => void;
}

interface State {
  error: Error | null;
  retryCount: number;
}

/**
 * Catches render errors below it and offers a bounded number of retries
 * before suggesting a page reload.
 */
export class ErrorBoundary extends Component<Props, State> {
  static readonly MAX_RETRIES = 3;

  state: State = { error: null, retryCount: 0 };

  static getDerivedStateFromError(error: Error): Partial<State> {
    return { error };
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo) {
    const scope = this.props.scope || 'App';
    console.error(`[ErrorBoundary:${scope}] Caught render error:`, error);
    console.error(`[ErrorBoundary:${scope}] Component stack:`, errorInfo.componentStack);
    this.props.onError?.(error, errorInfo);
  }

  handleRetry = () => {
    this.setState((prev) => ({ error: null, retryCount: prev.retryCount + 1 }));
  };

  handleReload = () => {
    window.location.reload();
  };

  render() {
    const { error, retryCount } = this.state;
    const { children, fallback, scope = 'App' } = this.props;

    if (!error) return children;
    if (fallback) return fallback;

    const canRetry = retryCount < ErrorBoundary.MAX_RETRIES;

    return (
      <div className="error-boundary" role="alert">
        <h3 className="error-boundary-title">
          {canRetry ? 'Something went wrong' : 'Something keeps going wrong'}
        </h3>
        <button
          type="button"
          className="error-boundary-action"
          onClick={canRetry ? this.handleRetry : this.handleReload}
        >
          {canRetry ? `Try again (${retryCount + 1}/${ErrorBoundary.MAX_RETRIES})` : 'Refresh page'}
        </button>
        <details className="error-boundary-details">
          <summary>Technical details</summary>
          <pre>{`Scope: ${scope}\nError: ${error.message || 'Unknown'}`}</pre>
        </details>
      </div>
    );
  }
}

export default ErrorBoundary;
