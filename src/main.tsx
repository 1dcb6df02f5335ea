import { StrictMode, Component } from 'react'
import type { ErrorInfo, ReactNode } from 'react'
import { createRoot } from 'react-dom/client'
import './index.css'
import App from './App'

// Errors raised outside the React tree replace the page with the raw message.
function showFatalError(message: string) {
  const root = document.getElementById('root')
  if (!root) return
  const pre = document.createElement('pre')
  pre.className = 'fatal-error'
  pre.textContent = message
  root.replaceChildren(pre)
}

window.addEventListener('error', (e) => showFatalError(String(e.error ?? e.message)))
window.addEventListener('unhandledrejection', (e) => showFatalError(String(e.reason)))

interface CalculatorBoundaryState {
  error: Error | null
  componentStack: string | null
}

/**
 * Catches render-time failures, in practice a ContractViolationError from the
 * sweep or the preset resolver, and offers to start over with the defaults.
 */
class CalculatorBoundary extends Component<{ children: ReactNode }, CalculatorBoundaryState> {
  state: CalculatorBoundaryState = { error: null, componentStack: null }

  static getDerivedStateFromError(error: Error): Partial<CalculatorBoundaryState> {
    return { error }
  }

  componentDidCatch(_error: Error, info: ErrorInfo) {
    this.setState({ componentStack: info.componentStack ?? null })
  }

  private reset = () => this.setState({ error: null, componentStack: null })

  render() {
    const { error, componentStack } = this.state
    if (!error) return this.props.children

    return (
      <div className="crash-panel" role="alert">
        <h2 className="crash-panel__title">The estimate could not be drawn</h2>
        <p className="crash-panel__body">
          {error.name === 'ContractViolationError'
            ? 'The calculator was handed inputs it cannot sweep.'
            : 'Something unexpected broke while rendering the results.'}
        </p>
        <div className="crash-panel__actions">
          <button type="button" className="cta-btn" onClick={this.reset}>Try again</button>
          <button type="button" className="cta-btn cta-btn--secondary" onClick={() => window.location.reload()}>
            Start over
          </button>
        </div>
        <details className="crash-panel__details">
          <summary>{error.name}</summary>
          <pre>{error.message}{componentStack ? `\n${componentStack}` : ''}</pre>
        </details>
      </div>
    )
  }
}

const container = document.getElementById('root')
if (!container) throw new Error('Missing #root element in index.html')

createRoot(container).render(
  <StrictMode>
    <CalculatorBoundary>
      <App />
    </CalculatorBoundary>
  </StrictMode>,
)
