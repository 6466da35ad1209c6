import React from "react";
import { QuestionBankError } from "./Questions";

type Props = { children: React.ReactNode };
type State = { error: Error | null };

export default class ErrorCatcher extends React.Component<Props, State> {
  state: State = { error: null };
  static getDerivedStateFromError(error: Error): State { return { error }; }
  componentDidCatch(error: Error, info: React.ErrorInfo) { console.error("App crashed:", error, info.componentStack); }
  render() {
    const { error } = this.state;
    if (error) {
      const isBank = error instanceof QuestionBankError;
      return (
        <div role="alert" style={{fontFamily:"system-ui,sans-serif",padding:20}}>
          <h1 style={{color:"#b00020"}}>{isBank ? "Question bank error" : "App error"}</h1>
          <pre style={{whiteSpace:"pre-wrap",background:"#f9f2f4",padding:12,borderRadius:8,border:"1px solid #eee"}}>
{isBank ? error.message : (error.stack || error.message)}
          </pre>
        </div>
      );
    }
    return this.props.children;
  }
}
